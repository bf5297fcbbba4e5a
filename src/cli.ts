#!/usr/bin/env node
import { readFile } from 'fs/promises';
import { loadConfigFromEnv } from './config/index.js';
import { AnalysisOrchestrator } from './core/analysis-orchestrator.js';
import { WifiEnvironmentAnalyzer } from './core/wifi-environment-analyzer.js';
import { createSnapshotSources, loadSnapshotFile } from './infra/snapshot-sources.js';
import { parseScanOutput } from './infra/wifi-scan-parser.js';
import { EngineError } from './utils/errors.js';

function printUsage(): void {
  console.log(`
Usage: lanwatch <command> <file>

Commands:
  analyze <snapshot.json>   Run one analysis cycle over a captured snapshot
  channels <scan.txt>       Score channels from iwlist or iw scan output

Examples:
  lanwatch analyze ./snapshot.json
  lanwatch channels ./scan.txt

Environment:
  LOG_LEVEL                             trace|debug|info|warn|error|fatal|silent
  LANWATCH_LOG_FILE                     Also write logs to this file
  LANWATCH_OFFLINE_THRESHOLD_MINUTES    Minutes before a device counts as offline (30)
  LANWATCH_PACKET_LOSS_WARNING          Percent (1)
  LANWATCH_PACKET_LOSS_CRITICAL         Percent (5)
  LANWATCH_LATENCY_WARNING_MS           Milliseconds (100)
  LANWATCH_LATENCY_CRITICAL_MS          Milliseconds (500)
  LANWATCH_WIFI_CLIENT_LIMIT            Clients (100)
`);
}

async function runAnalyze(filePath: string): Promise<unknown> {
  const snapshot = await loadSnapshotFile(filePath);
  const orchestrator = new AnalysisOrchestrator({
    sources: createSnapshotSources(snapshot),
    config: loadConfigFromEnv(),
  });

  const result = await orchestrator.runCycle();
  const environment = await orchestrator.scanWifiEnvironment();
  return {
    summary: result.summary,
    issues: result.issues,
    devices: result.roster,
    degradedSources: result.degradedSources,
    wifiEnvironment: new WifiEnvironmentAnalyzer().summarize(environment),
  };
}

async function runChannels(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf-8');
  const scan = parseScanOutput(text);
  const report = new WifiEnvironmentAnalyzer().analyze(scan.observations);
  return {
    format: scan.format,
    skipped: scan.skipped,
    channels: report.channels,
    recommendations: report.recommendations,
    overlapGroups: report.overlapGroups,
    hiddenNetworks: report.hiddenNetworks,
    messages: report.messages,
  };
}

async function main(): Promise<void> {
  const command = process.argv[2];
  const filePath = process.argv[3];

  if (!command || command === '--help' || command === '-h') {
    printUsage();
    process.exitCode = command ? 0 : 1;
    return;
  }

  if (!filePath) {
    console.error(JSON.stringify({ success: false, error: `Missing file argument for '${command}'` }, null, 2));
    process.exitCode = 1;
    return;
  }

  let result: unknown;
  switch (command) {
    case 'analyze':
      result = await runAnalyze(filePath);
      break;
    case 'channels':
      result = await runChannels(filePath);
      break;
    default:
      console.error(JSON.stringify({ success: false, error: `Unknown command: ${command}` }, null, 2));
      printUsage();
      process.exitCode = 1;
      return;
  }

  console.log(JSON.stringify({ success: true, command, data: result }, null, 2));
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({
    success: false,
    error: err instanceof Error ? err.message : String(err),
    code: err instanceof EngineError ? err.code : undefined,
  }, null, 2));
  process.exitCode = 1;
});
