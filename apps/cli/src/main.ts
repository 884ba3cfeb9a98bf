#!/usr/bin/env node

/**
 * askerp CLI entrypoint.
 * Guarded queries, template rendering and the assistant over an ERP database.
 */

import { Command, CommanderError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  DocPermOracle,
  LocalStore,
  OpenAIProvider,
  QueryGuard,
  SAFE_DEFAULTS,
  StaticPermissionOracle,
  answerCompletion,
  askAssistant,
  defaultDbPath,
  isSettingKey,
  loadGuardConfig,
  loadStaticGrants,
  openRowStore,
  parseBinding,
  parseDatabaseUrl,
  renderTemplate,
  resolveSettings,
  validateProviderSettings,
  type AnswerResult,
  type AssistantSettings,
  type AuditEvent,
  type ConnectionConfig,
  type GuardConfigOverrides,
  type PermissionOracle,
  type ResultBinding,
  type Row,
  type RowStore,
  type StaticGrants,
  type StoredAuditEvent,
  type StoredSettings,
} from '@askerp/core';
import { getPassword } from './util/password.js';
import { normalizeArgv } from './argv.js';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  errorMessage,
  policyError,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  consoleLogger,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printRows,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

function openStore(): LocalStore {
  const store = new LocalStore(process.env.ASKERP_LOCAL_DB ?? defaultDbPath());
  store.migrate();
  return store;
}

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

function readTextFile(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw usageError(`Cannot read ${what} ${path}: ${errorMessage(err)}`);
  }
}

/** A positional argument, or stdin when it is `-` */
async function argOrStdin(value: string | undefined, what: string): Promise<string> {
  if (value !== undefined && value !== '-') return value;
  const fromStdin = await readStdin();
  if (!fromStdin) {
    throw usageError(`Expected ${what} on stdin, but received empty input.`);
  }
  return fromStdin;
}

function stringOpt(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

interface GlobalOptions {
  db?: string;
  user?: string;
  permissions?: string;
  guardConfig?: string;
  audit: boolean;
  passwordStdin: boolean;
}

function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    db: stringOpt(opts.db) ?? stringOpt(process.env.ASKERP_DB),
    user: stringOpt(opts.user) ?? stringOpt(process.env.ASKERP_USER),
    permissions: stringOpt(opts.permissions),
    guardConfig: stringOpt(opts.guardConfig) ?? stringOpt(process.env.ASKERP_GUARD_CONFIG),
    audit: opts.audit !== false,
    passwordStdin: opts.passwordStdin === true,
  };
}

async function connectionConfig(options: GlobalOptions): Promise<ConnectionConfig> {
  if (!options.db) {
    throw usageError('No database configured. Pass --db <url> or set ASKERP_DB.', 'DB_NOT_CONFIGURED');
  }
  let config: ConnectionConfig;
  try {
    config = parseDatabaseUrl(options.db);
  } catch (err: unknown) {
    throw usageError(errorMessage(err));
  }
  if (config.type === 'mariadb' && config.password === undefined) {
    const password = options.passwordStdin ? await argOrStdin(undefined, 'password') : await getPassword();
    config = { ...config, password };
  }
  return config;
}

type PermissionSource = { kind: 'user'; user: string } | { kind: 'static'; grants: StaticGrants };

function permissionSource(options: GlobalOptions): PermissionSource {
  if (options.user && options.permissions) {
    throw usageError('Pass either --user or --permissions, not both.');
  }
  if (options.permissions) {
    try {
      return { kind: 'static', grants: loadStaticGrants(options.permissions) };
    } catch (err: unknown) {
      throw usageError(errorMessage(err), 'CONFIG_INVALID');
    }
  }
  if (options.user) {
    return { kind: 'user', user: options.user };
  }
  throw usageError('Pass --user <name> (ERP role permissions) or --permissions <file>.');
}

function guardOverrides(options: GlobalOptions): GuardConfigOverrides | undefined {
  if (!options.guardConfig) return undefined;
  try {
    return loadGuardConfig(options.guardConfig);
  } catch (err: unknown) {
    throw usageError(errorMessage(err), 'CONFIG_INVALID');
  }
}

interface GuardSession {
  store: RowStore;
  guard: QueryGuard;
}

async function withGuardSession<T>(
  command: Command,
  output: OutputOptions,
  fn: (session: GuardSession) => Promise<T>,
): Promise<T> {
  const options = globalOptions(command);
  const source = permissionSource(options);
  const overrides = guardOverrides(options);
  const config = await connectionConfig(options);
  const logger = consoleLogger(output);

  let store: RowStore;
  try {
    store = openRowStore(config);
  } catch (err: unknown) {
    throw runtimeError(`Cannot open database: ${errorMessage(err)}`, 'DB_CONN_FAILED');
  }

  const local = options.audit ? openStore() : null;
  const recordDecision = (event: AuditEvent): void => {
    try {
      local?.logAudit(event);
    } catch (err: unknown) {
      logger.warn('Could not write audit event', { error: errorMessage(err) });
    }
  };

  const permissions: PermissionOracle =
    source.kind === 'static' ? new StaticPermissionOracle(source.grants) : new DocPermOracle(store, source.user);
  const guard = new QueryGuard({ permissions, store, config: overrides, logger, onDecision: recordDecision });

  try {
    return await fn({ store, guard });
  } finally {
    local?.close();
    await store.close();
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parseJsonArg(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw usageError(`Invalid JSON in ${what}: ${errorMessage(err)}`);
  }
}

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLimit(raw: string): number {
  const limit = parseInt(raw, 10);
  if (!Number.isFinite(limit) || limit <= 0) {
    throw usageError('Invalid --limit. Expected a positive integer.');
  }
  return limit;
}

function maskSecret(value: string | null): string | null {
  if (!value) return value;
  return value.length <= 8 ? '********' : `${value.slice(0, 3)}…${value.slice(-4)}`;
}

function printAnswer(result: AnswerResult, output: OutputOptions, meta?: Record<string, unknown>): void {
  if (output.json) {
    printCommandSuccess({ ...meta, ...result }, output);
    return;
  }
  if (result.status === 'fallback') {
    printWarning('The completion could not be used as-is; showing it raw.', output);
  }
  for (const e of result.errors) {
    printWarning(`Query "${e.key}" failed: ${e.error}`, output);
  }
  printHuman(result.response, output);
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askerp')
  .description('askerp — guarded SQL and templated answers for an ERP assistant')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .option('--db <url>', 'Database URL (mariadb://user@host/db or sqlite:/path); default $ASKERP_DB')
  .option('--user <name>', 'Act as this ERP user (role permissions from the database)')
  .option('--permissions <file>', 'Act with static grants from a JSON file')
  .option('--guard-config <file>', 'Guard policy overrides (JSON); default $ASKERP_GUARD_CONFIG')
  .option('--password-stdin', 'Read the database password from stdin', false)
  .option('--no-audit', 'Do not record guard decisions in the local store')
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, settings
  Guard:    check, run, draft, audit
  Answers:  render, answer, ask
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check environment, settings and database connectivity')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const dbPath = process.env.ASKERP_LOCAL_DB ?? defaultDbPath();

          const store = openStore();
          let settingsProblems: string[];
          let provider: string | null = null;
          let model: string | null = null;
          try {
            const settings = resolveSettings(store.getStoredSettings());
            provider = settings.provider;
            model = settings.model;
            settingsProblems = validateProviderSettings(settings);
          } catch (err: unknown) {
            settingsProblems = [errorMessage(err)];
          } finally {
            store.close();
          }

          const options = globalOptions(this);
          let database: { configured: boolean; type: string | null; ok: boolean; error: string | null } = {
            configured: Boolean(options.db),
            type: null,
            ok: false,
            error: null,
          };
          if (options.db) {
            try {
              const config = await connectionConfig(options);
              database = { ...database, type: config.type };
              const rowStore = openRowStore(config);
              try {
                await rowStore.query('SELECT 1 AS ok');
                database = { ...database, ok: true };
              } finally {
                await rowStore.close();
              }
            } catch (err: unknown) {
              database = { ...database, error: errorMessage(err) };
            }
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            assistant: { provider, model, ok: settingsProblems.length === 0, problems: settingsProblems },
            database,
            paths: { dbPath, dbPathExists: existsSync(dbPath), configDir: dirname(dbPath) },
            safeDefaults: {
              maxRows: SAFE_DEFAULTS.maxRows,
              statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
            },
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('askerp doctor', output);
          printHuman('=============', output);
          printHuman('', output);
          printHuman(`Node.js:    ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Provider:   ${provider ?? '-'} / ${model ?? '-'}`, output);
          for (const problem of settingsProblems) {
            printHuman(`  ✗ ${problem}`, output);
          }
          if (!database.configured) {
            printHuman('Database:   not configured (--db or ASKERP_DB)', output);
          } else if (database.ok) {
            printHuman(`Database:   ${database.type} ✓`, output);
          } else {
            printHuman(`Database:   ✗ ${database.error ?? 'unreachable'}`, output);
          }
          printHuman(`Local DB:   ${dbPath}`, output);
          printHuman('', output);
          printHuman('Safe defaults:', output);
          printHuman(`  Max rows:          ${SAFE_DEFAULTS.maxRows}`, output);
          printHuman(`  Statement timeout: ${SAFE_DEFAULTS.statementTimeoutMs}ms`, output);
        });
      }),
  ),
  ['askerp doctor', 'askerp --db sqlite:./demo.sqlite doctor --json'],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Validate a statement against the guard without running it')
      .argument('[sql]', 'SQL statement, or - for stdin')
      .option('--doctype <name>', 'Record type an INSERT is meant for')
      .action(async function (this: Command, sqlArg: string | undefined, opts: { doctype?: string }) {
        await runCommand(this, async (output) => {
          const sql = await argOrStdin(sqlArg, 'SQL');
          const verdict = await withGuardSession(this, output, ({ guard }) => guard.validate(sql, opts.doctype));

          if (!verdict.allowed) {
            throw policyError(verdict.reason ?? 'Query not allowed', verdict);
          }
          if (output.json) {
            printCommandSuccess(verdict, output);
          } else {
            printHuman(`Allowed (${verdict.operation ?? 'unknown'})`, output);
          }
        });
      }),
  ),
  [
    'askerp --db sqlite:./demo.sqlite --user jane@example.com check "SELECT name FROM `tabCustomer`"',
    'echo "INSERT INTO `tabLead` (lead_name) VALUES (\'Ann\')" | askerp --permissions perms.json check -',
  ],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('run')
      .description('Validate and run a statement')
      .argument('[sql]', 'SQL statement, or - for stdin')
      .option('--doctype <name>', 'Record type an INSERT is meant for')
      .action(async function (this: Command, sqlArg: string | undefined, opts: { doctype?: string }) {
        await runCommand(this, async (output) => {
          const sql = await argOrStdin(sqlArg, 'SQL');
          const result = await withGuardSession(this, output, ({ guard }) => guard.execute(sql, opts.doctype));

          if (!result.success) {
            if (result.rule) throw policyError(result.error, { rule: result.rule });
            throw runtimeError(result.error, 'DB_QUERY_FAILED');
          }
          if (output.json) {
            printCommandSuccess({ rowCount: result.rows.length, rows: result.rows }, output);
            return;
          }
          printRows(result.rows, output);
          printHuman(`${result.rows.length} row(s)`, output);
        });
      }),
  ),
  ['askerp --db sqlite:./demo.sqlite --user Administrator run "SELECT name, territory FROM `tabCustomer` LIMIT 5"'],
);

// ── draft ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('draft')
      .description('Create a draft record without SQL (always docstatus 0)')
      .argument('<doctype>', 'Record type, e.g. Lead')
      .argument('[fields]', 'JSON object of field values, or - for stdin')
      .action(async function (this: Command, doctype: string, fieldsArg: string | undefined) {
        await runCommand(this, async (output) => {
          const data = parseJsonArg(await argOrStdin(fieldsArg, 'field JSON'), 'fields');
          if (!isRecord(data)) {
            throw usageError('Fields must be a JSON object.');
          }
          const result = await withGuardSession(this, output, ({ guard }) => guard.createDraftRecord(doctype, data));

          if (!result.success) {
            if (result.rule) throw policyError(result.error, { rule: result.rule });
            throw runtimeError(result.error, 'DB_QUERY_FAILED');
          }
          if (output.json) {
            printCommandSuccess({ name: result.name, message: result.message }, output);
          } else {
            printHuman(result.message, output);
          }
        });
      }),
  ),
  ['askerp --db sqlite:./demo.sqlite --user jane@example.com draft Lead \'{"lead_name":"Ann"}\''],
);

// ── render ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('render')
      .description('Render a template against query results from a JSON file')
      .option('--template <text>', 'Template text')
      .option('--template-file <path>', 'Read the template from a file')
      .option('--data <path>', 'JSON object mapping query keys to rows')
      .option('--no-fuzzy-loops', 'Loops only bind exactly matching keys')
      .action(async function (
        this: Command,
        opts: { template?: string; templateFile?: string; data?: string; fuzzyLoops: boolean },
      ) {
        await runCommand(this, async (output) => {
          if (opts.template !== undefined && opts.templateFile) {
            throw usageError('Pass either --template or --template-file, not both.');
          }
          const template =
            opts.template ?? (opts.templateFile ? readTextFile(opts.templateFile, 'template') : await readStdin());

          let binding: ResultBinding = {};
          if (opts.data) {
            try {
              binding = parseBinding(parseJsonArg(readTextFile(opts.data, 'data file'), opts.data));
            } catch (err: unknown) {
              throw usageError(errorMessage(err));
            }
          }

          const rendered = renderTemplate(template, binding, { fuzzyLoopKeys: opts.fuzzyLoops });
          if (output.json) {
            printCommandSuccess({ response: rendered }, output);
          } else {
            printHuman(rendered, output);
          }
        });
      }),
  ),
  [
    'askerp render --template "{{customer.name}} owes {{customer.balance}}" --data results.json',
    'askerp render --template-file answer.tmpl --data results.json --no-fuzzy-loops',
  ],
);

// ── answer ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('answer')
      .description('Answer from a model completion: run its queries through the guard and render its template')
      .argument('[file]', 'File holding the raw completion; stdin when omitted')
      .option('--no-fuzzy-loops', 'Loops only bind exactly matching keys')
      .action(async function (this: Command, file: string | undefined, opts: { fuzzyLoops: boolean }) {
        await runCommand(this, async (output) => {
          const raw = file ? readTextFile(file, 'completion') : await argOrStdin(undefined, 'completion');
          const result = await withGuardSession(this, output, ({ guard }) =>
            answerCompletion(raw, {
              guard,
              render: { fuzzyLoopKeys: opts.fuzzyLoops },
              logger: consoleLogger(output),
            }),
          );
          printAnswer(result, output);
        });
      }),
  ),
  ['askerp --db sqlite:./demo.sqlite --user Administrator answer completion.json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask the assistant a question about the ERP data')
      .argument('<question>', 'Natural-language question')
      .option('--schema-context <file>', 'Table notes to include in the prompt')
      .option('--no-fuzzy-loops', 'Loops only bind exactly matching keys')
      .action(async function (
        this: Command,
        question: string,
        opts: { schemaContext?: string; fuzzyLoops: boolean },
      ) {
        await runCommand(this, async (output) => {
          if (!question.trim()) {
            throw usageError('Question must not be empty.');
          }
          const store = openStore();
          let stored: StoredSettings;
          try {
            stored = store.getStoredSettings();
          } finally {
            store.close();
          }

          let settings: AssistantSettings;
          try {
            settings = resolveSettings(stored);
          } catch (err: unknown) {
            throw usageError(errorMessage(err), 'CONFIG_INVALID');
          }
          const problems = validateProviderSettings(settings);
          if (problems.length > 0) {
            throw usageError(problems.join('\n'), 'CONFIG_INVALID', { problems });
          }

          const logger = consoleLogger(output);
          const provider = new OpenAIProvider(settings, { logger });
          const schemaContext = opts.schemaContext ? readTextFile(opts.schemaContext, 'schema context') : undefined;

          const result = await withGuardSession(this, output, async ({ guard }) => {
            try {
              return await askAssistant({ question, schemaContext }, provider, {
                guard,
                render: { fuzzyLoopKeys: opts.fuzzyLoops },
                logger,
              });
            } catch (err: unknown) {
              throw runtimeError(`${settings.provider} request failed: ${errorMessage(err)}`, 'LLM_FAILED');
            }
          });

          if (output.verbose && !output.json) {
            printHuman(
              `(model ${result.completion.model}${result.completion.retried ? ', retried once' : ''})`,
              output,
            );
          }
          printAnswer(result.answer, output, {
            model: result.completion.model,
            retried: result.completion.retried,
          });
        });
      }),
  ),
  ['askerp --db mariadb://reader@127.0.0.1/site_db --user jane@example.com ask "Who are our top 5 customers?"'],
);

// ── settings ─────────────────────────────────────────────────────────

const settingsCmd = program.command('settings').description('Manage assistant provider settings');

withExamples(
  withOutputFlags(
    settingsCmd
      .command('set')
      .description('Set a provider setting (provider, api_key, model, base_url, temperature)')
      .argument('<key>', 'Setting key')
      .argument('<value>', 'Setting value')
      .action(async function (this: Command, key: string, value: string) {
        await runCommand(this, async (output) => {
          if (!isSettingKey(key)) {
            throw usageError(`Unknown setting "${key}". Expected provider, api_key, model, base_url or temperature.`);
          }
          const store = openStore();
          try {
            const next = { ...store.getStoredSettings(), [key]: value };
            try {
              resolveSettings(next, {});
            } catch (err: unknown) {
              throw usageError(errorMessage(err), 'CONFIG_INVALID');
            }
            store.setSetting(key, value);
          } finally {
            store.close();
          }

          const shown = key === 'api_key' ? maskSecret(value) : value;
          if (output.json) {
            printCommandSuccess({ key, value: shown }, output);
          } else {
            printHuman(`${key} = ${shown ?? ''}`, output);
          }
        });
      }),
  ),
  ['askerp settings set provider DeepSeek', 'askerp settings set base_url https://api.deepseek.com'],
);

withExamples(
  withOutputFlags(
    settingsCmd
      .command('unset')
      .description('Remove a stored setting (environment values apply again)')
      .argument('<key>', 'Setting key')
      .action(async function (this: Command, key: string) {
        await runCommand(this, async (output) => {
          const store = openStore();
          let removed: boolean;
          try {
            removed = store.deleteSetting(key);
          } finally {
            store.close();
          }
          if (output.json) {
            printCommandSuccess({ key, removed }, output);
          } else {
            printHuman(removed ? `${key} removed.` : `${key} was not set.`, output);
          }
        });
      }),
  ),
  ['askerp settings unset model'],
);

withExamples(
  withOutputFlags(
    settingsCmd
      .command('list')
      .description('Show stored settings and the effective provider configuration')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const store = openStore();
          let stored: Array<{ key: string; value: string | null }>;
          try {
            stored = store.listSettings().map(({ key, value }) => ({
              key,
              value: key === 'api_key' ? maskSecret(value) : value,
            }));
          } finally {
            store.close();
          }

          if (output.json) {
            printCommandSuccess({ settings: stored }, output);
            return;
          }
          if (stored.length === 0) {
            printHuman('No stored settings. Environment variables apply.', output);
            return;
          }
          printRows(stored, output);
        });
      }),
  ),
  ['askerp settings list', 'askerp settings list --json'],
);

// ── audit ────────────────────────────────────────────────────────────

const audit = program.command('audit').description('Inspect recorded guard decisions');

withExamples(
  withOutputFlags(
    audit
      .command('list')
      .description('List recent guard decisions, newest first')
      .option('--denied', 'Only denied statements', false)
      .option('--limit <n>', 'Maximum entries', '50')
      .action(async function (this: Command, opts: { denied: boolean; limit: string }) {
        await runCommand(this, async (output) => {
          const limit = parseLimit(opts.limit);
          const store = openStore();
          let events: StoredAuditEvent[];
          try {
            events = store.listAuditEvents({ decision: opts.denied ? 'denied' : undefined, limit });
          } finally {
            store.close();
          }

          if (output.json) {
            printCommandSuccess({ events }, output);
            return;
          }
          if (events.length === 0) {
            printHuman('No audit events.', output);
            return;
          }
          printRows(
            events.map((e) => ({
              at: e.at,
              decision: e.decision,
              operation: e.operation,
              doctype: e.doctype,
              reason: e.reason,
              sql_hash: e.sqlHash,
            })),
            output,
          );
        });
      }),
  ),
  ['askerp audit list --denied --limit 20'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
