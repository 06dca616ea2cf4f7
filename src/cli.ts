#!/usr/bin/env node
import chalk from "chalk";
import { buildGateway, type Gateway } from "./app.js";
import { ConfigError, loadConfig } from "./config/defaults.js";
import { optimizePriorities, rankResults, runStressTest } from "./gateway/priority-optimizer.js";
import type { Outcome } from "./gateway/types.js";
import { parseCommand } from "./cli/commands.js";
import { confirmRanking } from "./cli/prompt.js";
import { fields, heading, line, table, withSpinner } from "./cli/ui.js";

function printHelp(): void {
  heading("switchyard: LLM provider gateway");
  console.log([
    "  Usage: switchyard <command> [args]",
    "",
    "    auto [message]        send through automatic failover",
    "    list                  configured providers by priority",
    "    status                availability and flagged providers",
    "    keys [provider]       per-key usage report",
    "    stress [iterations]   benchmark every provider and re-rank",
    "    <provider> [message]  send to one provider directly",
    "",
  ].join("\n"));
}

function printOutcome(outcome: Outcome): void {
  if (outcome.success) {
    line("ok", `${outcome.providerUsed} (${outcome.modelUsed}) in ${outcome.responseTimeSeconds.toFixed(2)}s`);
    console.log(`\n${outcome.content}\n`);
  } else {
    line("fail", `${outcome.errorKind}: ${outcome.errorMessage}`);
  }
}

async function runCompletion(gateway: Gateway, message: string): Promise<boolean> {
  const outcome = await withSpinner("Finding an available provider...", () =>
    gateway.engine.complete([{ role: "user", content: message }]));
  printOutcome(outcome);
  return outcome.success;
}

async function runProvider(gateway: Gateway, provider: string, message?: string): Promise<boolean> {
  const outcome = await withSpinner(`Asking ${provider}...`, () => gateway.engine.testProvider(provider, message));
  printOutcome(outcome);
  return outcome.success;
}

function runList(gateway: Gateway): void {
  heading("Providers");
  table(
    ["#", "Name", "Format", "Model", "Keys", "Enabled"],
    gateway.engine.listProviders().map((p) => [
      String(p.priority),
      p.name,
      p.format,
      p.model,
      String(p.keyCount),
      p.enabled ? "yes" : "no",
    ]),
  );
}

function runStatus(gateway: Gateway): void {
  const status = gateway.engine.getStatus();
  heading("Status");
  fields([
    ["Providers", `${status.availableProviders}/${status.totalProviders} available`],
    ["Flagged", String(status.flaggedProviders)],
    ["Current", status.currentProvider ?? "none"],
    ["Top", status.topAvailable.join(", ") || "none"],
  ]);
  for (const name of status.flaggedList) line("warn", `${name} is flagged`);
}

function runKeys(gateway: Gateway, provider?: string): boolean {
  const names = provider ? [provider] : gateway.engine.listProviders().map((p) => p.name);
  for (const name of names) {
    const report = gateway.engine.getKeyReport(name);
    if (!report) {
      line("fail", `Provider '${name}' not found`);
      return false;
    }
    heading(`${name} (current: Key #${report.currentKey + 1})`);
    const rows = Object.entries(report.perCredential).map(([label, r]) => [
      label,
      String(r.requests),
      `${r.successRate.toFixed(1)}%`,
      String(r.requestsThisMinute),
      r.weight.toFixed(2),
      r.rateLimited ? "yes" : "no",
      r.flaggedUntil ?? "-",
    ]);
    if (rows.length === 0) line("note", "no keys configured");
    else table(["Key", "Requests", "Success", "This min", "Weight", "Limited", "Flagged until"], rows);
  }
  return true;
}

async function runStress(gateway: Gateway, iterations: number): Promise<void> {
  heading(`Stress test: ${iterations} request(s) per provider`);
  const results = await withSpinner("Testing providers...", (retitle) =>
    runStressTest(gateway.engine, iterations, (result) => retitle(`Tested ${result.provider}`)));

  for (const r of results) {
    line(r.passed ? "ok" : "fail", `${r.provider}: ${r.successfulTests}/${r.totalTests} ok, avg ${r.avgResponseTime.toFixed(2)}s`);
  }

  const ranking = rankResults(results);
  if (ranking.length === 0) {
    line("warn", "No provider passed; priorities unchanged");
    return;
  }

  if (await confirmRanking(ranking)) {
    for (const change of optimizePriorities(gateway.engine, results)) {
      line("note", `${change.priority}. ${change.provider} (score ${change.score.toFixed(1)})`);
    }
  }
}

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  if (command.kind === "help") {
    printHelp();
    return;
  }

  const config = loadConfig();
  const gateway = buildGateway(config);

  let ok = true;
  switch (command.kind) {
    case "auto":
      ok = await runCompletion(gateway, command.message);
      break;
    case "list":
      runList(gateway);
      break;
    case "status":
      runStatus(gateway);
      break;
    case "keys":
      ok = runKeys(gateway, command.provider);
      break;
    case "stress":
      await runStress(gateway, command.iterations);
      break;
    case "provider":
      ok = await runProvider(gateway, command.provider, command.message);
      break;
  }

  if (!ok) process.exitCode = 1;
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(chalk.red(`\n${err.message}\n`));
  } else if (err instanceof Error && err.message.includes("User force closed")) {
    console.log("\nAborted.\n");
  } else {
    console.error("\nError:", err);
  }
  process.exit(1);
});
