/**
 * Transfer validators — policy for ordinary transfers of wrapped assets.
 *
 * The Destination Issuer consults its validator on every transfer that
 * is neither a bridge mint nor a bridge burn. Returning false rejects
 * the transfer.
 */

import type { Address } from "@relaymint/types";
import type { TransferContext } from "@relaymint/registry";

export interface TransferValidator {
  /** Identifies the validator in events and status */
  readonly id: string;
  validateTransfer(ctx: TransferContext): boolean;
}

/**
 * Lets holders move their own assets and lets only allowlisted
 * operators move assets on someone else's behalf.
 */
export class AllowlistTransferValidator implements TransferValidator {
  readonly id: string;
  private readonly _operators: Set<Address>;

  constructor(id: string, operators: readonly Address[] = []) {
    this.id = id;
    this._operators = new Set(operators);
  }

  allow(operator: Address): void {
    this._operators.add(operator);
  }

  disallow(operator: Address): void {
    this._operators.delete(operator);
  }

  isAllowed(operator: Address): boolean {
    return this._operators.has(operator);
  }

  validateTransfer(ctx: TransferContext): boolean {
    return ctx.operator === ctx.from || this._operators.has(ctx.operator);
  }
}
