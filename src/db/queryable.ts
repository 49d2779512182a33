/** The slice of `pg.Pool` the repositories use. Tests pass an in-process fake. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}
