#!/usr/bin/env -S node --import tsx
/**
 * rootdrop CLI: offline proof checks and calls against a distributor.
 *
 * Commands:
 *   leaf <index> <account> <amount>            Print the leaf hash
 *   verify <claim.json> [--root <hash>]        Offline proof check (exit 1 if invalid)
 *   claim <claim.json>                         POST /claim
 *   status <period> <index>                    GET /claimed/:period/:index
 *   roots <from> <to>                          GET /roots?from=&to=
 *   seed <period> <root> <total> <source>      POST /seed (admin token)
 *   owner [transfer <addr> | accept | renounce] GET /owner, POST /owner/* (admin token)
 *   config                                     Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig } from "./lib/config.js";
import { leafCommand } from "./commands/leaf.js";
import { verifyCommand } from "./commands/verify.js";
import { claimCommand } from "./commands/claim.js";
import { statusCommand } from "./commands/status.js";
import { rootsCommand } from "./commands/roots.js";
import { seedCommand } from "./commands/seed.js";
import {
  ownerAcceptCommand,
  ownerCommand,
  ownerRenounceCommand,
  ownerTransferCommand,
} from "./commands/owner.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("rootdrop")
  .description("Merkle distribution claims: verify proofs offline, claim and query a distributor")
  .version("0.1.0");

// ── leaf ────────────────────────────────────────────────────────────

program
  .command("leaf")
  .description("Print the leaf hash for an entitlement")
  .argument("<index>", "Entitlement index (decimal)")
  .argument("<account>", "Recipient address (0x + 40 hex)")
  .argument("<amount>", "Amount in base units (decimal)")
  .action((index: string, account: string, amount: string) => {
    leafCommand(index, account, amount);
  });

// ── verify ──────────────────────────────────────────────────────────

program
  .command("verify")
  .description("Check a claim file's proof against its root, offline")
  .argument("<file>", "Claim file (JSON)")
  .option("-r, --root <hash>", "Root to verify against (overrides the file's root)")
  .action(async (file: string, opts: { root?: string }) => {
    const result = await verifyCommand(file, opts);
    if (!result.valid) process.exitCode = 1;
  });

// ── claim ───────────────────────────────────────────────────────────

program
  .command("claim")
  .description("Submit a claim file to the distributor")
  .argument("<file>", "Claim file (JSON)")
  .option("-d, --distributor <url>", "Distributor URL override")
  .action(async (file: string, opts: { distributor?: string }) => {
    const config = await loadConfig();
    if (opts.distributor) config.distributor = opts.distributor;
    await claimCommand(file, config);
  });

// ── status ──────────────────────────────────────────────────────────

program
  .command("status")
  .description("Show whether (period, index) has been claimed")
  .argument("<period>", "Period number")
  .argument("<index>", "Entitlement index")
  .option("-d, --distributor <url>", "Distributor URL override")
  .action(async (period: string, index: string, opts: { distributor?: string }) => {
    const config = await loadConfig();
    if (opts.distributor) config.distributor = opts.distributor;
    await statusCommand(period, index, config);
  });

// ── roots ───────────────────────────────────────────────────────────

program
  .command("roots")
  .description("List seeded roots for an inclusive period range")
  .argument("<from>", "First period")
  .argument("<to>", "Last period")
  .option("-d, --distributor <url>", "Distributor URL override")
  .action(async (from: string, to: string, opts: { distributor?: string }) => {
    const config = await loadConfig();
    if (opts.distributor) config.distributor = opts.distributor;
    await rootsCommand(from, to, config);
  });

// ── seed ────────────────────────────────────────────────────────────

program
  .command("seed")
  .description("Publish and fund a period root (admin)")
  .argument("<period>", "Period number")
  .argument("<root>", "Merkle root (0x + 64 hex)")
  .argument("<total>", "Total allocation pulled from the funding source")
  .argument("<source>", "Funding source address (must have approved custody)")
  .option("-d, --distributor <url>", "Distributor URL override")
  .action(async (period: string, root: string, total: string, source: string, opts: { distributor?: string }) => {
    const config = await loadConfig();
    if (opts.distributor) config.distributor = opts.distributor;
    await seedCommand(period, root, total, source, config);
  });

// ── owner ───────────────────────────────────────────────────────────

const owner = program
  .command("owner")
  .description("Show the owner, or hand ownership over (admin token)")
  .option("-d, --distributor <url>", "Distributor URL override")
  .action(async (opts: { distributor?: string }) => {
    const config = await loadConfig();
    if (opts.distributor) config.distributor = opts.distributor;
    await ownerCommand(config);
  });

owner
  .command("transfer")
  .description("Nominate a new owner (current owner's token)")
  .argument("<address>", "Nominee address (0x + 40 hex)")
  .action(async (address: string) => {
    const config = await loadConfig();
    const parent = owner.opts<{ distributor?: string }>();
    if (parent.distributor) config.distributor = parent.distributor;
    await ownerTransferCommand(address, config);
  });

owner
  .command("accept")
  .description("Accept a nomination (nominee's token)")
  .action(async () => {
    const config = await loadConfig();
    const parent = owner.opts<{ distributor?: string }>();
    if (parent.distributor) config.distributor = parent.distributor;
    await ownerAcceptCommand(config);
  });

owner
  .command("renounce")
  .description("Leave the distributor without an owner; seeding stops for good")
  .action(async () => {
    const config = await loadConfig();
    const parent = owner.opts<{ distributor?: string }>();
    if (parent.distributor) config.distributor = parent.distributor;
    await ownerRenounceCommand(config);
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("-d, --distributor <url>", "Set distributor URL")
  .option("--admin-token <token>", "Set admin token for seed")
  .action(async (opts: { distributor?: string; adminToken?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
