import type { Failure } from "../contracts/error";
import { failure } from "../contracts/error";
import type { LedgerSnapshot } from "../contracts/checkpoint.schema";
import { generateId } from "../lib/id";
import { Rng } from "../lib/rng";
import type { Ledger } from "./ledger";

export const GENESIS_LEDGER_ID = "genesis_ledger";

export type BalanceReply = { success: true; agent_id: string; scrip: number; compute: number };
export type AllBalancesReply = { success: true; balances: LedgerSnapshot };
export type TransferReply = {
  success: true;
  transferred: number;
  currency: "scrip";
  from: string;
  to: string;
  from_scrip_after: number;
  to_scrip_after: number;
};
export type SpawnReply = { success: true; principal_id: string };

export type GenesisReply = BalanceReply | AllBalancesReply | TransferReply | SpawnReply | Failure;

type Handler = (args: readonly unknown[], invokerId: string) => GenesisReply;

/**
 * Invoke-style view of the ledger. Agents move scrip through
 * `invoke_artifact("genesis_ledger", "transfer", [from, to, amount])`; the
 * invoker may only ever spend its own balance.
 */
export class GenesisLedger {
  public readonly id = GENESIS_LEDGER_ID;
  private readonly handlers: Record<string, Handler>;

  public constructor(
    private readonly ledger: Ledger,
    private readonly rng: Rng = new Rng()
  ) {
    this.handlers = {
      balance: (args, invokerId) => this.balance(args, invokerId),
      all_balances: () => this.allBalances(),
      transfer: (args, invokerId) => this.transfer(args, invokerId),
      spawn_principal: () => this.spawnPrincipal()
    };
  }

  public methods(): string[] {
    return Object.keys(this.handlers);
  }

  public invoke(method: string, args: readonly unknown[], invokerId: string): GenesisReply {
    const handler = Object.hasOwn(this.handlers, method) ? this.handlers[method] : undefined;
    if (!handler) {
      return failure(
        "UNKNOWN_METHOD",
        `Method '${method}' not found on ${this.id}. Available: ${this.methods().join(", ")}`,
        { method }
      );
    }
    return handler(args, invokerId);
  }

  private balance(args: readonly unknown[], invokerId: string): GenesisReply {
    const [agentId] = args;
    if (typeof agentId !== "string" || agentId === "") {
      return failure(
        "MISSING_ARGUMENT",
        `balance requires [agent_id]. Example: ${this.id}.balance(['${invokerId}'])`,
        { required: ["agent_id"] }
      );
    }
    return {
      success: true,
      agent_id: agentId,
      scrip: this.ledger.getScrip(agentId),
      compute: this.ledger.getCompute(agentId)
    };
  }

  private allBalances(): GenesisReply {
    return { success: true, balances: this.ledger.getAllBalances() };
  }

  private transfer(args: readonly unknown[], invokerId: string): GenesisReply {
    if (args.length < 3) {
      return failure(
        "MISSING_ARGUMENT",
        `transfer requires [from_id, to_id, amount] (3 args, got ${args.length})`,
        { required: ["from_id", "to_id", "amount"] }
      );
    }
    const [fromId, toId, amount] = args;
    if (typeof fromId !== "string" || typeof toId !== "string") {
      return failure("INVALID_ARGUMENT", "from_id and to_id must be strings");
    }
    if (fromId !== invokerId) {
      return failure(
        "NOT_AUTHORIZED",
        `Cannot transfer from ${fromId} - you are ${invokerId}. You can only transfer your own scrip.`,
        { invoker: invokerId, target: fromId }
      );
    }
    if (typeof amount !== "number" || !Number.isInteger(amount)) {
      return failure(
        "INVALID_ARGUMENT",
        `Amount must be an integer, got ${typeof amount}: ${JSON.stringify(amount)}`,
        { provided: amount }
      );
    }
    if (amount <= 0) {
      return failure("INVALID_ARGUMENT", `Amount must be positive, got ${amount}`, {
        provided: amount
      });
    }
    if (!this.ledger.transferScrip(fromId, toId, amount)) {
      return failure(
        "INSUFFICIENT_FUNDS",
        "Transfer failed (insufficient scrip or invalid recipient)",
        { from_id: fromId, to_id: toId, amount }
      );
    }
    return {
      success: true,
      transferred: amount,
      currency: "scrip",
      from: fromId,
      to: toId,
      from_scrip_after: this.ledger.getScrip(fromId),
      to_scrip_after: this.ledger.getScrip(toId)
    };
  }

  /** New principals start empty; the spawner funds them with transfers. */
  private spawnPrincipal(): GenesisReply {
    let id = generateId("agent", this.rng, 8);
    while (this.ledger.hasPrincipal(id)) {
      id = generateId("agent", this.rng, 8);
    }
    this.ledger.createPrincipal(id, 0, 0);
    return { success: true, principal_id: id };
  }
}
