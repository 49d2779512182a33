import type { ActionRequest } from "../contracts/action.schema";
import { checkActionFields, isActionType } from "../contracts/action.schema";
import type { Outcome } from "../contracts/error";
import { extractJsonObject } from "./extract-json";

export const TRANSFER_GUIDANCE =
  "transfer is not a kernel action. Use: invoke_artifact('genesis_ledger', 'transfer', [from_id, to_id, amount])";

/**
 * Gate between raw agent output and the action handlers. Never throws: every
 * malformed input comes back as an error string.
 *
 * `action_type` is matched case-insensitively; the returned request keeps the
 * casing the agent wrote.
 */
export function validateActionJson(text: string): Outcome<ActionRequest> {
  const extracted = extractJsonObject(text);
  if (!extracted.ok) return extracted;
  const data = extracted.value;

  const rawType = data.action_type;
  if (typeof rawType !== "string") {
    return { ok: false, error: `Invalid action_type: ${rawType === undefined ? "" : JSON.stringify(rawType)}` };
  }
  const actionType = rawType.toLowerCase();
  if (actionType === "transfer") return { ok: false, error: TRANSFER_GUIDANCE };
  if (!isActionType(actionType)) return { ok: false, error: `Invalid action_type: ${actionType}` };

  const fieldError = checkActionFields(actionType, data);
  if (fieldError) return { ok: false, error: fieldError };
  return { ok: true, value: { ...data, action_type: rawType } };
}
