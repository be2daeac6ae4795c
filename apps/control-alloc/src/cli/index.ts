/**
 * CLI エントリ（コマンドのディスパッチ）
 *
 * stdout には結果JSONのみを出力し、診断メッセージは stderr に出す。
 */
import * as E from 'fp-ts/Either';
import { loadEnv } from '../config/env.js';
import { loadAllocationPolicy, type PolicyOverrides } from '../config/policy.js';
import { createAllocationContext, describeRules, handleAllocate } from '../core/handlers.js';
import { usageError, type DomainError } from '../domain/errors.js';
import { parseAllocateArgs, readRequest } from './allocate.js';

export const CLI_NAME = 'control-alloc';

function reportError(error: DomainError): number {
  console.error(`[${CLI_NAME}] ${error.code}: ${error.message}`);
  return 1;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * allocate コマンド
 */
async function handleAllocateCommand(args: string[]): Promise<number> {
  const parsed = parseAllocateArgs(args);
  if (E.isLeft(parsed)) return reportError(parsed.left);
  const { source, overrides } = parsed.right;

  const policy = await loadAllocationPolicy(loadEnv(), overrides)();
  if (E.isLeft(policy)) return reportError(policy.left);
  if (policy.right.featureFlags.fastTrackEnabled) {
    console.error(`[${CLI_NAME}] Fast-Track enabled (policy ${policy.right.version})`);
  }

  const request = await readRequest(source)();
  if (E.isLeft(request)) return reportError(request.left);

  const response = handleAllocate(request.right, createAllocationContext(policy.right));
  if (E.isLeft(response)) return reportError(response.left);

  printJson(response.right);
  return 0;
}

/**
 * policy コマンド（環境変数・CLI上書き適用後の実効ポリシーを表示）
 */
async function handlePolicyCommand(args: string[]): Promise<number> {
  let overrides: PolicyOverrides = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    if (arg === '--policy') {
      if (nextArg === undefined) return reportError(usageError('--policy requires a file path'));
      overrides = { ...overrides, policyPath: nextArg };
      i++;
    } else if (arg === '--fast-track') {
      overrides = { ...overrides, fastTrackEnabled: true };
    } else if (arg === '--no-fast-track') {
      overrides = { ...overrides, fastTrackEnabled: false };
    } else {
      return reportError(usageError(`unknown option: ${String(arg)}`));
    }
  }

  const policy = await loadAllocationPolicy(loadEnv(), overrides)();
  if (E.isLeft(policy)) return reportError(policy.left);

  printJson(policy.right);
  return 0;
}

/**
 * ヘルプを表示
 */
function showHelp(): void {
  console.log(`
${CLI_NAME} - security-control allocation from information classification

Usage: ${CLI_NAME} <command> [options]

Commands:
  allocate    Allocate the required security-control count
  rules       List the allocation rules in priority order
  policy      Show the effective deployment policy

Selection flags for allocate:
  --cui                     Controlled Unclassified Information
  --cdi-dfars               Covered Defense Information (DFARS)
  --itar                    ITAR-controlled
  --ear                     EAR-controlled
  --ear99-plus              EAR99 or higher
  --public-data             Public data only
  --pilot                   Short-duration pilot system
  --system-scope <scope>    internal | external | unset
  --competition-sensitive   Competition-sensitive data
  --proprietary             Proprietary data
  --pii                     Personally identifiable information
  --field <name>=<value>    Fast-Track template field (repeatable)

Request input (instead of selection flags):
  --json <payload>          {"selection": {...}, "templateFields": {...}}
  --input <path>            JSON file with the same shape

Policy options (allocate, policy):
  --policy <path>           Policy YAML (default: $CONTROL_ALLOC_POLICY or built-in)
  --fast-track              Enable Fast-Track for this run
  --no-fast-track           Disable Fast-Track for this run

Examples:
  ${CLI_NAME} allocate --pii --system-scope external
  ${CLI_NAME} allocate --json '{"selection":{"cui":true}}'
  ${CLI_NAME} rules
`);
}

/**
 * CLI のエントリポイント
 * @returns 終了コード
 */
export async function runCli(argv: string[]): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case 'allocate':
      return handleAllocateCommand(args);
    case 'rules':
      printJson(describeRules());
      return 0;
    case 'policy':
      return handlePolicyCommand(args);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return 0;
    default:
      console.error(`[${CLI_NAME}] Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}
