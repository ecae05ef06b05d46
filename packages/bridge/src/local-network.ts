/**
 * Local network — a full deployment on simulated collaborators.
 *
 * Wires, for every ledger in a NetworkConfig:
 * - an InMemoryAssetRegistry (the role is its only custodian)
 * - a NativeBalances book (payments, fee payouts and transport refunds),
 *   opened with the configured balances
 * - the role: OriginCustodian on the origin, DestinationIssuer elsewhere
 *
 * All roles share one InMemoryTransport and trust each other as
 * remotes, so assets can travel origin → destination, destination →
 * origin, and destination → destination.
 *
 * Used by tests, the demo and the HTTP node.
 */

import type { Logger } from "pino";
import type { Address, LedgerId } from "@relaymint/types";
import { InMemoryAssetRegistry, NativeBalances } from "@relaymint/registry";
import { InMemoryTransport } from "@relaymint/transport";
import { parseNetworkConfig } from "./config.js";
import type { NetworkConfig, NetworkConfigInput } from "./config.js";
import { OriginCustodian } from "./custodian.js";
import { DestinationIssuer } from "./issuer.js";
import type { BridgeRole } from "./role.js";

// =============================================================================
// Types
// =============================================================================

export interface LedgerNode<R extends BridgeRole> {
  readonly ledgerId: LedgerId;
  readonly registry: InMemoryAssetRegistry;
  readonly balances: NativeBalances;
  readonly role: R;
}

export interface LocalNetwork {
  readonly config: NetworkConfig;
  readonly transport: InMemoryTransport;
  readonly origin: LedgerNode<OriginCustodian>;
  readonly destinations: ReadonlyMap<LedgerId, LedgerNode<DestinationIssuer>>;
  /** Every ledger, origin first */
  readonly ledgers: readonly LedgerNode<BridgeRole>[];
  /** Address allowed to mint originals on the origin ledger */
  readonly minter: Address;
}

export interface LocalNetworkOptions {
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a local deployment from a network description.
 *
 * @throws {z.ZodError} if the description is invalid
 */
export function createLocalNetwork(
  input: NetworkConfigInput,
  options: LocalNetworkOptions = {},
): LocalNetwork {
  const config = parseNetworkConfig(input);
  const minter = config.origin.minter ?? config.admin;

  const books = new Map<LedgerId, NativeBalances>();
  books.set(config.origin.ledgerId, new NativeBalances(config.origin.ledgerId, config.origin.custodian));
  for (const destination of config.destinations) {
    books.set(destination.ledgerId, new NativeBalances(destination.ledgerId, destination.issuer));
  }
  for (const [ledgerId, accounts] of Object.entries(config.balances)) {
    const book = bookFor(books, ledgerId);
    for (const [address, amount] of Object.entries(accounts)) {
      if (amount > 0n) book.deposit(address, amount);
    }
  }

  const transport = new InMemoryTransport({
    deliveryCost: config.deliveryCost,
    refundChannels: books,
  });

  const addresses: Record<LedgerId, Address> = {
    [config.origin.ledgerId]: config.origin.custodian,
  };
  const classes: Record<LedgerId, string> = {
    [config.origin.ledgerId]: config.origin.feeClass,
  };
  for (const destination of config.destinations) {
    addresses[destination.ledgerId] = destination.issuer;
    classes[destination.ledgerId] = destination.feeClass;
  }

  /** Every other ledger, as seen from `self` */
  const counterparts = (self: LedgerId) => ({
    trustedRemotes: Object.fromEntries(
      Object.entries(addresses).filter(([ledgerId]) => ledgerId !== self),
    ),
    feeSchedule: {
      classes: Object.fromEntries(
        Object.entries(classes).filter(([ledgerId]) => ledgerId !== self),
      ),
      fees: config.fees,
    },
  });

  const originRegistry = new InMemoryAssetRegistry({
    ledgerId: config.origin.ledgerId,
    minters: [minter],
    custodians: [config.origin.custodian],
  });
  const originBook = bookFor(books, config.origin.ledgerId);
  const custodian = new OriginCustodian({
    ledgerId: config.origin.ledgerId,
    address: config.origin.custodian,
    admin: config.admin,
    registry: originRegistry,
    transport,
    payouts: originBook,
    payments: originBook,
    logger: options.logger,
    ...counterparts(config.origin.ledgerId),
  });
  transport.connect(config.origin.ledgerId, custodian.address, custodian);
  const origin: LedgerNode<OriginCustodian> = {
    ledgerId: config.origin.ledgerId,
    registry: originRegistry,
    balances: originBook,
    role: custodian,
  };

  const destinations = new Map<LedgerId, LedgerNode<DestinationIssuer>>();
  for (const destination of config.destinations) {
    const registry = new InMemoryAssetRegistry({
      ledgerId: destination.ledgerId,
      minters: [destination.issuer],
      custodians: [destination.issuer],
    });
    const book = bookFor(books, destination.ledgerId);
    const issuer = new DestinationIssuer({
      ledgerId: destination.ledgerId,
      address: destination.issuer,
      admin: config.admin,
      registry,
      transport,
      payouts: book,
      payments: book,
      logger: options.logger,
      ...counterparts(destination.ledgerId),
    });
    transport.connect(destination.ledgerId, issuer.address, issuer);
    destinations.set(destination.ledgerId, {
      ledgerId: destination.ledgerId,
      registry,
      balances: book,
      role: issuer,
    });
  }

  return {
    config,
    transport,
    origin,
    destinations,
    ledgers: [origin, ...destinations.values()],
    minter,
  };
}

function bookFor(books: ReadonlyMap<LedgerId, NativeBalances>, ledgerId: LedgerId): NativeBalances {
  const book = books.get(ledgerId);
  if (book === undefined) {
    throw new Error(`No native balance book for "${ledgerId}"`);
  }
  return book;
}
