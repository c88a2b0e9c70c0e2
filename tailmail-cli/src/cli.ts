#!/usr/bin/env node

import { defineCommand, runMain } from "citty";
import { ConfigError } from "./config/errors.js";
import { describeConfig, loadConfig, type LoadConfigOptions } from "./config/loader.js";
import type { ResolvedConfig } from "./config/types.js";
import { LOG_PREFIX, runWatch } from "./core/run.js";

function loadConfigOrExit(options: LoadConfigOptions): ResolvedConfig {
  try {
    return loadConfig(options);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`${LOG_PREFIX} ${e.message}`);
      process.exit(1);
    }
    throw e;
  }
}

const watch = defineCommand({
  meta: { name: "watch", description: "Echo stdin to stdout and mail out errors found in it" },
  args: {
    config: { type: "string", description: "Path to the config file" },
    "dry-run": { type: "boolean", description: "Print incidents to stderr instead of mailing them" },
    debug: { type: "boolean", description: "Send even if the input ends during the startup grace period" },
    quiet: { type: "boolean", description: "Suppress tailmail's own diagnostics" },
  },
  async run({ args }) {
    const config = loadConfigOrExit({
      configPath: args.config,
      dryRun: args["dry-run"],
      debug: args.debug,
    });

    await runWatch(config, { quiet: args.quiet });
    process.exit(0);
  },
});

const check = defineCommand({
  meta: { name: "check", description: "Validate the config and optionally classify a line" },
  args: {
    config: { type: "string", description: "Path to the config file" },
    line: { type: "string", description: "Sample line to classify" },
    "dry-run": { type: "boolean", description: "Do not require mail settings" },
    json: { type: "boolean", description: "Output as JSON" },
  },
  run({ args }) {
    const config = loadConfigOrExit({ configPath: args.config, dryRun: args["dry-run"] });
    const classification = args.line === undefined ? undefined : config.matcher.classify(args.line);

    if (args.json) {
      console.log(JSON.stringify({ config: describeConfig(config), classification }, null, 2));
      return;
    }

    console.log("═══════════════════════════════════════");
    console.log("       tailmail config");
    console.log("═══════════════════════════════════════");
    console.log("");
    console.log(`✅ ${config.configPath ?? "(environment only)"}`);
    console.log(`   app:       ${config.appName}`);
    console.log(`   match:     /${config.match}/${config.ignoreCase ? "i" : ""}`);
    if (config.ignore) {
      console.log(`   ignore:    /${config.ignore}/${config.ignoreCase ? "i" : ""}`);
    }
    console.log(`   context:   ${config.contextLines} line(s), queue ${config.queueSize}`);
    console.log(`   limit:     ${config.maxEmailsPerHour} email(s) per hour`);
    if (config.mail) {
      console.log(`   mail:      ${config.mail.from} → ${config.mail.to.join(", ")}`);
      console.log(`   smtp:      ${config.mail.smtp.host}:${config.mail.smtp.port}`);
    } else {
      console.log(`   mail:      (dry run)`);
    }

    if (args.line !== undefined) {
      console.log("");
      const icon = classification === "error" ? "🔴" : "⚪";
      console.log(`${icon} "${args.line}" → ${classification}`);
    }
  },
});

const init = defineCommand({
  meta: { name: "init", description: "Print a config template" },
  run() {
    const template = {
      appName: "my-app",
      match: "error|panic|fatal",
      ignore: "deprecated",
      maxEmailsPerHour: 5,
      mail: {
        from: "alerts@example.com",
        to: ["ops@example.com"],
        smtp: { host: "smtp.example.com", port: 25 },
      },
    };

    console.log("# tailmail.config.json template");
    console.log(JSON.stringify(template, null, 2));
    console.log("");
    console.log("Save this as tailmail.config.json and run: your-app 2>&1 | tailmail watch");
  },
});

const main = defineCommand({
  meta: {
    name: "tailmail",
    version: "0.1.0",
    description: "Pipe logs through, get mailed about the errors in them",
  },
  subCommands: {
    watch,
    check,
    init,
  },
});

runMain(main);
