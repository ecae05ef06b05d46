#!/usr/bin/env node
/**
 * @relaymint/demo — Interactive CLI walkthrough.
 *
 * Runs one asset around a three-ledger deployment in your terminal:
 * mint -> quote -> lock -> deliver -> trade under royalty and validator ->
 * burn -> unlock -> replay refused -> fees withdrawn -> audit
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import pino from "pino";
import { AllowlistTransferValidator, BridgeError, createLocalNetwork } from "@relaymint/bridge";
import type { DestinationIssuer, LocalNetwork, LedgerNode } from "@relaymint/bridge";
import type { DeliveryResult } from "@relaymint/transport";
import { auditCustodyInvariants, computeNetworkStateHash, observeNetwork } from "@relaymint/verify";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

const ADMIN = "0xadmin";
const ALICE = "0xalice";
const BOB = "0xbob";
const MARKET = "0xmarket";
const STUDIO = "0xstudio";
const TREASURY = "0xtreasury";
const ASSET = 42n;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     RELAYMINT DEMO                      ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("            Lock, mint, burn, unlock                     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function destination(network: LocalNetwork, ledgerId: string): LedgerNode<DestinationIssuer> {
  const node = network.destinations.get(ledgerId);
  if (node === undefined) {
    throw new Error(`No issuer on ledger "${ledgerId}"`);
  }
  return node;
}

function describeDelivery(result: DeliveryResult | undefined): string {
  if (result === undefined) return "nothing pending";
  if (result.status === "delivered") return `delivered (attempt ${result.attempt})`;
  const reason = result.error instanceof BridgeError ? result.error.code : String(result.error);
  return `failed: ${reason} (attempt ${result.attempt})`;
}

const TOTAL_STEPS = 10;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one asset leaving home and coming back."));
  console.log(chalk.gray("  Every step uses real domain packages, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const network = createLocalNetwork(
    {
      admin: ADMIN,
      origin: { ledgerId: "origin", custodian: "0xcustodian" },
      destinations: [
        { ledgerId: "dest-a", issuer: "0xissuer-a", feeClass: "standard" },
        { ledgerId: "dest-b", issuer: "0xissuer-b", feeClass: "premium" },
      ],
      fees: { origin: 5n, standard: 10n, premium: 25n },
      deliveryCost: 3n,
      balances: {
        origin: { [ALICE]: 100n },
        "dest-a": { [BOB]: 100n },
      },
    },
    { logger: pino({ level: "silent" }) },
  );
  const origin = network.origin;
  const destA = destination(network, "dest-a");

  for (const node of network.ledgers) {
    ok(`${node.role.kind} on ${node.ledgerId} (${node.role.address})`);
  }

  await sleep(DELAY_MS);

  // ─── Step 2: Mint Original ──────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Mint Original");

  origin.registry.mint(network.minter, ALICE, ASSET);
  ok(`Asset ${ASSET} minted to ${ALICE} on origin`);
  info("balance", `${origin.balances.balanceOf(ALICE).toString()} native units`);

  await sleep(DELAY_MS);

  // ─── Step 3: Quote & Lock ───────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Quote & Lock");

  const quote = origin.role.quoteBridge("dest-a", ASSET);
  info("fee", quote.fee.toString());
  info("delivery cost", quote.deliveryCost.toString());

  const out = origin.role.bridgeOut(ALICE, ASSET, "dest-a", quote.total + 2n);
  ok(`Asset ${ASSET} locked with ${origin.role.address}`);
  hashLine("message", out.messageId);
  info("refunded", out.refunded.toString());
  info("balance", `${origin.balances.balanceOf(ALICE).toString()} native units`);

  await sleep(DELAY_MS);

  // ─── Step 4: Audit In Flight ────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Audit In Flight");

  const inFlight = observeNetwork(network);
  info("in flight", `${inFlight.inFlight.length} message(s)`);
  info("verdict", auditCustodyInvariants(inFlight).verdict);
  ok("The message is the asset's only live representation");

  await sleep(DELAY_MS);

  // ─── Step 5: Deliver ────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Deliver");

  info("delivery", describeDelivery(network.transport.deliverNext()));
  ok(`Wrapped asset ${ASSET} minted to ${destA.registry.ownerOf(ASSET)} on dest-a`);

  await sleep(DELAY_MS);

  // ─── Step 6: Trade on Destination ───────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Trade on Destination");

  destA.role.setRoyaltyInfo(ADMIN, STUDIO, 250);
  destA.role.setTransferValidator(ADMIN, new AllowlistTransferValidator("marketplaces", [MARKET]));
  ok("Royalty 2.5% to studio, transfers limited to allowlisted operators");

  destA.registry.approve(ALICE, "0xrogue", ASSET);
  try {
    destA.registry.transferCustody("0xrogue", ALICE, BOB, ASSET);
  } catch (err) {
    if (!(err instanceof BridgeError)) throw err;
    warn(`0xrogue refused: ${err.code}`);
  }

  destA.registry.approve(ALICE, MARKET, ASSET);
  destA.registry.transferCustody(MARKET, ALICE, BOB, ASSET);
  ok(`${MARKET} sold asset ${ASSET} to ${BOB}`);

  const royalty = destA.role.royaltyInfo(ASSET, 1_000n);
  info("royalty on 1000", `${royalty.amount.toString()} to ${royalty.receiver}`);

  await sleep(DELAY_MS);

  // ─── Step 7: Burn & Unlock ──────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Burn & Unlock");

  const back = destA.role.bridgeOut(BOB, ASSET, "origin", destA.role.quoteBridge("origin", ASSET).total);
  ok(`Wrapped asset ${ASSET} burned on dest-a`);
  info("delivery", describeDelivery(network.transport.deliverNext()));
  ok(`Original released to ${origin.registry.ownerOf(ASSET)}`);

  await sleep(DELAY_MS);

  // ─── Step 8: Replay ─────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Replay");

  info("first message", describeDelivery(network.transport.redeliver(out.messageId)));
  info("return message", describeDelivery(network.transport.redeliver(back.messageId)));
  ok("Delivered messages cannot move the asset twice");

  await sleep(DELAY_MS);

  // ─── Step 9: Withdraw Fees ──────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Withdraw Fees");

  for (const node of network.ledgers) {
    if (node.role.policy.escrow.balance === 0n) continue;
    const amount = node.role.withdrawFees(ADMIN, TREASURY);
    info(node.ledgerId, `${amount.toString()} paid to ${TREASURY}`);
  }
  ok("Escrows swept");

  await sleep(DELAY_MS);

  // ─── Step 10: Summary ───────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Summary");

  const final = observeNetwork(network);
  const audit = auditCustodyInvariants(final);
  const stateHash = computeNetworkStateHash(final);
  const events = network.ledgers.reduce((sum, node) => sum + node.role.policy.events.count, 0);

  console.log();
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(events)));
  console.log(chalk.white("    Messages pending:    ") + chalk.cyan.bold(String(final.inFlight.length)));
  console.log(
    chalk.white("    Custody audit:       ") +
      (audit.verdict === "PASS" ? chalk.green.bold("PASS") : chalk.red.bold("FAIL")),
  );
  console.log(chalk.white("    State hash:          ") + chalk.yellow(stateHash.hash.slice(0, 16) + "..." + stateHash.hash.slice(-8)));
  console.log();
  console.log(chalk.gray("    One asset, one live representation, at every step."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
