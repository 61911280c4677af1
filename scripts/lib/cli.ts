import path from 'node:path';

import { interactivePromptAdapter, type PromptAdapter } from './cli_prompts.js';
import { loadEnvFile, loadOdooConfig, loadSankhyaConfig, loadSyncSettings } from './config.js';
import { runHierarchySync } from './hierarchy/engine.js';
import { buildHierarchyNodes } from './hierarchy/node.js';
import { createProfile } from './hierarchy/profiles.js';
import { formatRunReport, formatSourceValidation } from './hierarchy/report.js';
import {
  HIERARCHY_KINDS,
  isHierarchyKind,
  type HierarchyKind,
  type RunReport,
  type SourceValidation
} from './hierarchy/types.js';
import { validateSourceHierarchy } from './hierarchy/validate.js';
import {
  getRunOptions,
  repoPath,
  RUN_FLAGS,
  toPosixRelative,
  withoutRunFlags,
  writeJsonFile,
  type RunFlag,
  type RunOptions,
  type WriteResult
} from './io.js';
import { consoleLogger, type SyncLogger } from './logger.js';
import { FileSourceReader, SankhyaSourceReader, type SourceReader } from './source/reader.js';
import { SankhyaClient } from './source/sankhya_client.js';
import { OdooClient } from './target/odoo_client.js';
import type { TargetStore } from './target/store.js';

export interface ParsedCommandLine {
  command?: string;
  options: Map<string, string>;
  run: RunOptions;
}

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

export function parseCommandLine(
  argv: string[],
  allowedOptions: readonly string[],
  allowedFlags: readonly RunFlag[] = []
): ParsedCommandLine {
  for (const flag of RUN_FLAGS) {
    if (argv.includes(flag) && !allowedFlags.includes(flag)) {
      throw new Error(
        `Unsupported flag '${flag}'. Expected ${allowedFlags.join('|') || 'no flags'}`
      );
    }
  }

  const run = getRunOptions(argv);
  const rest = withoutRunFlags(argv);
  const first = rest[0];
  const hasCommand = first !== undefined && !first.startsWith('--');
  const options = parseCliOptionMap(hasCommand ? rest.slice(1) : rest);

  for (const key of options.keys()) {
    if (!allowedOptions.includes(key)) {
      throw new Error(
        `Unknown option '--${key}'. Expected ${allowedOptions.map((name) => `--${name}`).join('|') || 'no options'}`
      );
    }
  }

  return {
    command: hasCommand ? first.trim().toLowerCase() : undefined,
    options,
    run
  };
}

export async function resolveKind(
  command: string | undefined,
  prompt: PromptAdapter
): Promise<HierarchyKind> {
  if (!command) {
    return prompt.select<HierarchyKind>({
      message: 'Hierarchy:',
      choices: [
        { name: 'categories', value: 'categories', description: 'product categories' },
        { name: 'locations', value: 'locations', description: 'stock locations' }
      ]
    });
  }

  if (!isHierarchyKind(command)) {
    throw new Error(`Unknown hierarchy '${command}'. Expected ${HIERARCHY_KINDS.join('|')}`);
  }
  return command;
}

export function createSourceReader(options: Map<string, string>): SourceReader {
  const sourceDir = options.get('source-dir');
  if (sourceDir) {
    return new FileSourceReader(path.resolve(sourceDir));
  }
  return new SankhyaSourceReader(new SankhyaClient(loadSankhyaConfig()));
}

export interface CliDependencies {
  prompt: PromptAdapter;
  logger: SyncLogger;
  /** Called once per sync run, after the source has been read. */
  openTarget: () => TargetStore;
}

const defaultDependencies: CliDependencies = {
  prompt: interactivePromptAdapter,
  logger: consoleLogger,
  openTarget: () => new OdooClient(loadOdooConfig())
};

export async function runSyncCli(
  argv: string[] = process.argv.slice(2),
  deps: CliDependencies = defaultDependencies
): Promise<RunReport> {
  loadEnvFile();
  const { command, options, run } = parseCommandLine(argv, ['source-dir', 'report'], ['--require-key-field']);
  const kind = await resolveKind(command, deps.prompt);
  const profile = createProfile(kind, loadSyncSettings());

  const records = await createSourceReader(options).readRecords(profile);
  deps.logger.info(`${kind}: ${records.length} source rows`);

  const store = deps.openTarget();
  const report = await runHierarchySync(profile, records, store, {
    requireKeyField: run.requireKeyField,
    logger: deps.logger
  });

  for (const line of formatRunReport(report)) {
    deps.logger.info(line);
  }

  const reportFile = options.get('report');
  if (reportFile) {
    const target = path.resolve(reportFile);
    await writeJsonFile(target, report, { check: false });
    deps.logger.info(`Wrote ${toPosixRelative(target)}`);
  }

  return report;
}

export interface ValidationOutcome {
  kind: HierarchyKind;
  validation: SourceValidation;
  rejected: number;
  check: boolean;
}

export async function runValidateCli(
  argv: string[] = process.argv.slice(2),
  deps: CliDependencies = defaultDependencies
): Promise<ValidationOutcome> {
  loadEnvFile();
  const { command, options, run } = parseCommandLine(argv, ['source-dir'], ['--check']);
  const kind = await resolveKind(command, deps.prompt);
  const profile = createProfile(kind, loadSyncSettings());

  const records = await createSourceReader(options).readRecords(profile);
  const { nodes, rejected } = buildHierarchyNodes(records, profile.columns, profile.defaultName);
  const validation = validateSourceHierarchy(nodes);

  deps.logger.info(`${kind}: ${records.length} source rows, ${rejected.length} rejected`);
  deps.logger.info(formatSourceValidation(kind, validation));

  return { kind, validation, rejected: rejected.length, check: run.check };
}

export async function runExportCli(
  argv: string[] = process.argv.slice(2),
  deps: CliDependencies = defaultDependencies
): Promise<WriteResult> {
  loadEnvFile();
  const { command, options, run } = parseCommandLine(argv, ['source-dir', 'out'], ['--check']);
  const kind = await resolveKind(command, deps.prompt);
  const profile = createProfile(kind, loadSyncSettings());

  const records = await createSourceReader(options).readRecords(profile);
  const outFile = options.get('out');
  const target = outFile ? path.resolve(outFile) : repoPath('snapshots', kind, 'source.json');
  const result = await writeJsonFile(target, { records }, run);

  if (!result.changed) {
    deps.logger.info(`${kind} snapshot: no changes (${records.length} rows)`);
  } else if (result.wrote) {
    deps.logger.info(`Wrote ${toPosixRelative(target)} (${records.length} rows)`);
  } else {
    deps.logger.info(`${kind} snapshot is stale: ${toPosixRelative(target)}`);
  }

  return result;
}
