#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Command } from "commander";
import { z } from "zod";

import { inviteCommand } from "./commands/invite.js";
import { listCommand } from "./commands/list.js";
import { paramCollect } from "./commands/paramsParse.js";
import { runCommand } from "./commands/run.js";
import { startCommand } from "./commands/start.js";
import { statusCommand } from "./commands/status.js";
import { stopCommand } from "./commands/stop.js";
import { whitelistCommand } from "./commands/whitelist.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./paths.js";

const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();

program.name("rappman").description("Robot app manager").version(pkg.version);

program
    .command("start")
    .description("Run the rapp manager daemon")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Override the control socket path")
    .option("-f, --force", "Stop any running daemon before starting")
    .action(startCommand);

program
    .command("status")
    .description("Show the running rapp and hub connection")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(statusCommand);

program
    .command("list")
    .description("List installed and runnable rapps")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(listCommand);

program
    .command("run")
    .description("Start a rapp")
    .argument("<rappId>", "Rapp id, e.g. turtle/talker")
    .option("-p, --param <name=value>", "Rapp parameter (repeatable)", paramCollect)
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(runCommand);

program
    .command("stop")
    .description("Stop the running rapp")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(stopCommand);

program
    .command("whitelist")
    .description("Show or change which hubs may control this robot")
    .option("--local-only", "Refuse every remote hub")
    .option("--no-local-only", "Accept remote hubs again")
    .option("--allow <patterns...>", "Replace the whitelist")
    .option("--deny <patterns...>", "Replace the blacklist")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(whitelistCommand);

program
    .command("invite")
    .description("Hand remote control to a hub, or cancel it")
    .argument("<hub>", "Hub name")
    .option("--cancel", "Release the hub's control and stop its rapp")
    .option("-n, --namespace <name>", "Application namespace for the next start")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--socket <path>", "Control socket path")
    .action(inviteCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
