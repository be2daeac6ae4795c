/**
 * 入力境界のzodスキーマ
 *
 * 評価器は型安全な入力を前提とするため、形式不正はここで INVALID_SELECTION として弾く。
 * 未知キーも拒否する（フラグ名のtypoが黙ってfalse扱いになるのを防ぐ）。
 */
import { z } from 'zod';
import * as E from 'fp-ts/Either';
import { SYSTEM_SCOPES, type ClassificationSelection } from '@control-alloc/policy-schemas';
import type { TemplateFields } from '@control-alloc/rules';
import { invalidSelectionError, type DomainError } from './errors.js';

export const SystemScopeSchema = z.enum(SYSTEM_SCOPES);

export const ClassificationSelectionSchema = z
  .object({
    cui: z.boolean().optional(),
    cdiDfars: z.boolean().optional(),
    itar: z.boolean().optional(),
    ear: z.boolean().optional(),
    ear99Plus: z.boolean().optional(),
    publicData: z.boolean().optional(),
    pilotShortDuration: z.boolean().optional(),
    systemScope: SystemScopeSchema.optional(),
    competitionSensitive: z.boolean().optional(),
    proprietary: z.boolean().optional(),
    pii: z.boolean().optional(),
  })
  .strict();

// Fast-Track テンプレート項目（項目名 → 文字列値）
export const TemplateFieldsSchema = z.record(z.string().max(4096));

export const AllocationRequestSchema = z
  .object({
    selection: ClassificationSelectionSchema,
    templateFields: TemplateFieldsSchema.optional(),
  })
  .strict();

export interface AllocationRequest {
  readonly selection: ClassificationSelection;
  readonly templateFields: TemplateFields;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join(', ');
}

export const parseSelection = (input: unknown): E.Either<DomainError, ClassificationSelection> => {
  const result = ClassificationSelectionSchema.safeParse(input);
  if (!result.success) {
    return E.left(invalidSelectionError(formatIssues(result.error)));
  }
  return E.right(Object.freeze(result.data));
};

export const parseAllocationRequest = (input: unknown): E.Either<DomainError, AllocationRequest> => {
  const result = AllocationRequestSchema.safeParse(input);
  if (!result.success) {
    return E.left(invalidSelectionError(formatIssues(result.error)));
  }
  return E.right({
    selection: Object.freeze(result.data.selection),
    templateFields: Object.freeze(result.data.templateFields ?? {}),
  });
};
