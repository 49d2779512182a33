import type { JsonValue } from "../contracts/json";
import type { Ledger } from "../ledger/ledger";
import type { CapabilityTable } from "./interpreter";

export const WALLET_CAPABILITIES = ["pay", "get_balance"] as const;

export type PaymentResult = {
  success: boolean;
  amount: JsonValue;
  recipient: JsonValue;
  error: string;
};

function paymentError(recipient: JsonValue, amount: JsonValue, error: string): PaymentResult {
  return { success: false, amount, recipient, error };
}

/**
 * `pay(recipient, amount)`: moves scrip out of the artifact's own balance and
 * nowhere else. The recipient is created on first payment.
 */
export function pay(
  ledger: Ledger,
  artifactId: string,
  recipient: JsonValue,
  amount: JsonValue
): PaymentResult {
  if (typeof recipient !== "string" || recipient.length === 0) {
    return paymentError(recipient, amount, "Recipient must be a non-empty string");
  }
  if (typeof amount !== "number" || !Number.isInteger(amount)) {
    return paymentError(recipient, amount, `Amount must be an integer, got ${JSON.stringify(amount)}`);
  }
  if (amount <= 0) {
    return paymentError(recipient, amount, "Amount must be positive");
  }
  if (!ledger.canAffordScrip(artifactId, amount)) {
    return paymentError(recipient, amount, "Insufficient funds in artifact wallet");
  }
  if (!ledger.hasPrincipal(recipient)) {
    ledger.createPrincipal(recipient, 0, 0);
  }
  if (!ledger.transferScrip(artifactId, recipient, amount)) {
    return paymentError(recipient, amount, "Insufficient funds in artifact wallet");
  }
  return { success: true, amount, recipient, error: "" };
}

/** Capability table binding `pay` and `get_balance` to one artifact's wallet. */
export function bindWallet(ledger: Ledger, artifactId: string): CapabilityTable {
  return {
    names: WALLET_CAPABILITIES,
    invoke(name: string, args: JsonValue[]): JsonValue {
      switch (name) {
        case "pay": {
          if (args.length !== 2) {
            throw new TypeError(`pay() takes 2 arguments (recipient, amount) but ${args.length} were given`);
          }
          const [recipient, amount] = args;
          return pay(ledger, artifactId, recipient, amount);
        }
        case "get_balance":
          return ledger.getScrip(artifactId);
        default:
          throw new Error(`unknown wallet capability: ${name}`);
      }
    }
  };
}
