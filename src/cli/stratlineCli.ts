#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { engineConfigFromEnv, type EngineConfig } from '../config/engineConfig.js';
import { loadEncounterFromJson, type EncounterLoadResult } from '../encounter/loader.js';
import type { SessionOptions } from '../engine/session.js';
import { createConsoleLogger } from '../logging/logger.js';
import { instanceKey } from '../timeline/instance.js';
import { parseInstancesArgs, parseSeekArgs } from './utils/args.js';
import { formatSeekSummary, runSeek } from './utils/seek.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`stratline – plan and inspect encounter timelines

Commands:
  validate <encounter.json> [--json] [--verbose]
  instances <encounter.json> <segmentId> [--json]
  seek <encounter.json> --at <seconds> [--seed n] [--mode planning|simulation] [--pin Var=Value]... [--root <segmentId>] [--json]

Environment:
  STRATLINE_SEED, STRATLINE_MODE, STRATLINE_MAX_REPLAY_SPAN override engine defaults.

Run "stratline <command> --help" to learn more about a command.`);
};

const printSeekUsage = () => {
  console.log(`stratline seek

Load an encounter, seek once to a timestamp and print the resulting scene.

Required:
  <encounter.json>         Encounter document
  --at <seconds>           Global timestamp (out-of-range values are clamped)

Optional:
  --seed <number>          Session seed for sampled variations (default 1337)
  --mode <mode>            planning (pins and defaults first) or simulation (sample)
  --pin <Var=Value>        Pin a variation; repeatable
  --root <segmentId>       Plan a segment on its own instead of the whole timeline
  --json                   Emit the scene as JSON
`);
};

const readEncounter = async (
  path: string,
  config: Partial<EngineConfig>,
  extra: Omit<SessionOptions, 'config'> = {},
) => {
  const json = await readFile(resolve(process.cwd(), path), 'utf8');
  return loadEncounterFromJson(json, path, { config, ...extra });
};

const reportLoadFailure = (path: string, result: Extract<EncounterLoadResult, { kind: 'error' }>, json: boolean) => {
  if (json) {
    console.log(JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2));
  } else {
    console.error(`✖ Encounter invalid: ${path}`);
    console.error(`  ${result.message}`);
    result.issues
      ?.filter((issue) => issue.severity === 'error')
      .forEach((issue) => {
        console.error(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
      });
  }
  process.exit(1);
};

const handleValidateCommand = async (args: string[], config: Partial<EngineConfig>) => {
  const flags = new Set(args.filter((arg) => arg.startsWith('--')));
  const path = args.find((arg) => !arg.startsWith('--'));
  if (!path) {
    return exitWithError('validate requires an encounter path.');
  }
  const result = await readEncounter(path, config);
  if (result.kind === 'error') {
    return reportLoadFailure(path, result, flags.has('--json'));
  }
  const { encounter, session } = result;
  const warnings = result.issues.filter((issue) => issue.severity === 'warning');
  if (flags.has('--json')) {
    console.log(
      JSON.stringify(
        {
          status: 'ok',
          encounter: {
            name: encounter.metadata.name,
            hash: session.hash,
            root: session.graph.rootId,
            duration: session.graph.duration(session.graph.rootId),
            segments: encounter.segments.length,
            instances: session.graph.allInstances().length,
            entities: encounter.entities.length,
            variations: encounter.variations.length,
          },
          warnings,
        },
        null,
        2,
      ),
    );
    return;
  }
  console.log(`✔ Encounter valid: ${path}`);
  console.log(`  name:     ${encounter.metadata.name}`);
  console.log(`  hash:     ${session.hash}`);
  console.log(`  timeline: ${session.graph.duration(session.graph.rootId)}s from "${session.graph.rootId}"`);
  console.log(
    `  content:  ${encounter.segments.length} segments, ${session.graph.allInstances().length} instances, ${encounter.entities.length} entities, ${encounter.variations.length} variations`,
  );
  if (warnings.length > 0 && flags.has('--verbose')) {
    console.warn('Warnings:');
    warnings.forEach((issue) => {
      console.warn(`  • ${issue.message} (${issue.code})`);
    });
  }
};

const handleInstancesCommand = async (args: string[], config: Partial<EngineConfig>) => {
  const parsed = parseInstancesArgs(args);
  if (parsed.kind === 'error') {
    return exitWithError(parsed.message);
  }
  const { file, segmentId, json } = parsed.options;
  const result = await readEncounter(file, config);
  if (result.kind === 'error') {
    return reportLoadFailure(file, result, json);
  }
  const { graph } = result.session;
  if (!graph.has(segmentId)) {
    return exitWithError(`Unknown segment "${segmentId}".`);
  }
  const duration = graph.duration(segmentId);
  const instances = graph.instancesOf(segmentId).map((path) => {
    const start = path[path.length - 1].start;
    return { key: instanceKey(path), start, end: start + duration };
  });
  if (json) {
    console.log(JSON.stringify({ status: 'ok', segmentId, duration, instances }, null, 2));
    return;
  }
  console.log(`${segmentId} (${duration}s) placed ${instances.length} time(s):`);
  for (const instance of instances) {
    console.log(`  ${instance.key}  [${instance.start}s, ${instance.end}s)`);
  }
};

const handleSeekCommand = async (args: string[], config: Partial<EngineConfig>) => {
  if (args.includes('--help') || args.includes('-h')) {
    printSeekUsage();
    process.exit(0);
  }
  const parsed = parseSeekArgs(args);
  if (parsed.kind === 'error') {
    return exitWithError(parsed.message);
  }
  const options = parsed.options;
  const overrides: Partial<EngineConfig> = { ...config };
  if (options.seed !== undefined) overrides.seed = options.seed;
  if (options.mode !== undefined) overrides.variationMode = options.mode;
  const result = await readEncounter(options.file, overrides, { pins: options.pins, root: options.root });
  if (result.kind === 'error') {
    return reportLoadFailure(options.file, result, options.json);
  }
  const summary = runSeek(result.session, options.at, createConsoleLogger('timeline'));
  if (options.json) {
    console.log(JSON.stringify({ status: 'ok', ...summary }, null, 2));
    return;
  }
  formatSeekSummary(summary).forEach((line) => console.log(line));
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const config = engineConfigFromEnv(process.env);
  const [command, ...rest] = argv;
  switch (command) {
    case 'validate':
      await handleValidateCommand(rest, config);
      break;
    case 'instances':
      await handleInstancesCommand(rest, config);
      break;
    case 'seek':
      await handleSeekCommand(rest, config);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
