/**
 * allocate コマンド
 *
 * Usage:
 *   control-alloc allocate [--cui] [--itar] ... [--system-scope internal] [--field name=value]...
 *   control-alloc allocate --json '{"selection":{"pii":true,"systemScope":"External"}}'
 *   control-alloc allocate --input request.json
 */
import * as fs from 'node:fs/promises';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import { SYSTEM_SCOPES, type ClassificationSelection } from '@control-alloc/policy-schemas';
import {
  invalidSelectionError,
  usageError,
  type DomainError,
} from '../domain/errors.js';
import type { PolicyOverrides } from '../config/policy.js';

type BooleanFlag = Exclude<keyof ClassificationSelection, 'systemScope'>;

/**
 * CLIオプション → 分類フラグ
 */
const FLAG_OPTIONS: Readonly<Record<string, BooleanFlag>> = {
  '--cui': 'cui',
  '--cdi-dfars': 'cdiDfars',
  '--itar': 'itar',
  '--ear': 'ear',
  '--ear99-plus': 'ear99Plus',
  '--public-data': 'publicData',
  '--pilot': 'pilotShortDuration',
  '--competition-sensitive': 'competitionSensitive',
  '--proprietary': 'proprietary',
  '--pii': 'pii',
};

export type RequestSource =
  | { readonly kind: 'flags'; readonly request: Record<string, unknown> }
  | { readonly kind: 'json'; readonly text: string }
  | { readonly kind: 'input'; readonly path: string };

export interface AllocateArgs {
  readonly source: RequestSource;
  readonly overrides: PolicyOverrides;
}

/**
 * systemScope の大文字小文字を正規化（該当なしはそのまま返し、境界検証で弾く）
 */
function normalizeScope(value: string): string {
  return SYSTEM_SCOPES.find((s) => s.toLowerCase() === value.toLowerCase()) ?? value;
}

/**
 * allocate の引数をパース
 */
export function parseAllocateArgs(args: string[]): E.Either<DomainError, AllocateArgs> {
  const selection: Record<string, unknown> = {};
  const templateFields: Record<string, string> = {};
  let json: string | undefined;
  let inputPath: string | undefined;
  let policyPath: string | undefined;
  let fastTrackEnabled: boolean | undefined;
  let usedFlags = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    const nextArg = args[i + 1];
    const flag = FLAG_OPTIONS[arg];

    if (flag !== undefined) {
      selection[flag] = true;
      usedFlags = true;
    } else if (arg === '--system-scope') {
      if (nextArg === undefined) return E.left(usageError('--system-scope requires a value'));
      selection['systemScope'] = normalizeScope(nextArg);
      usedFlags = true;
      i++;
    } else if (arg === '--field') {
      const eq = nextArg?.indexOf('=') ?? -1;
      if (nextArg === undefined || eq <= 0) {
        return E.left(usageError('--field requires <name>=<value>'));
      }
      templateFields[nextArg.slice(0, eq)] = nextArg.slice(eq + 1);
      usedFlags = true;
      i++;
    } else if (arg === '--json') {
      if (nextArg === undefined) return E.left(usageError('--json requires a payload'));
      json = nextArg;
      i++;
    } else if (arg === '--input') {
      if (nextArg === undefined) return E.left(usageError('--input requires a file path'));
      inputPath = nextArg;
      i++;
    } else if (arg === '--policy') {
      if (nextArg === undefined) return E.left(usageError('--policy requires a file path'));
      policyPath = nextArg;
      i++;
    } else if (arg === '--fast-track') {
      fastTrackEnabled = true;
    } else if (arg === '--no-fast-track') {
      fastTrackEnabled = false;
    } else {
      return E.left(usageError(`unknown option: ${arg}`));
    }
  }

  const sources = [usedFlags, json !== undefined, inputPath !== undefined].filter(Boolean).length;
  if (sources > 1) {
    return E.left(usageError('use only one of selection flags, --json or --input'));
  }

  const overrides: PolicyOverrides = {
    ...(policyPath !== undefined && { policyPath }),
    ...(fastTrackEnabled !== undefined && { fastTrackEnabled }),
  };

  if (json !== undefined) return E.right({ source: { kind: 'json', text: json }, overrides });
  if (inputPath !== undefined) {
    return E.right({ source: { kind: 'input', path: inputPath }, overrides });
  }
  return E.right({
    source: { kind: 'flags', request: { selection, templateFields } },
    overrides,
  });
}

function parseJson(text: string, origin: string): E.Either<DomainError, unknown> {
  return E.tryCatch(
    (): unknown => JSON.parse(text),
    () => invalidSelectionError(`${origin} is not valid JSON`)
  );
}

/**
 * リクエストの取得（未検証のまま返す）
 */
export function readRequest(source: RequestSource): TE.TaskEither<DomainError, unknown> {
  switch (source.kind) {
    case 'flags':
      return TE.right(source.request);
    case 'json':
      return TE.fromEither(parseJson(source.text, '--json payload'));
    case 'input':
      return pipe(
        TE.tryCatch(
          () => fs.readFile(source.path, 'utf8'),
          (e) => usageError(`cannot read input file: ${source.path}`, e)
        ),
        TE.chainEitherK((text) => parseJson(text, `input file ${source.path}`))
      );
  }
}
