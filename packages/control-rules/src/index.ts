export {
  ALLOCATION_RULES,
  DEFAULT_RULE,
  isDfarsTier,
  type AllocationRule,
  type RuleId,
  type RuleMatch,
} from './rules.js';
export { evaluate, explain, type RuleEvaluator, type RuleExplainer } from './evaluate.js';
export {
  createFastTrackGate,
  missingTemplateFields,
  route,
  type FastTrackGate,
  type Ineligibility,
  type RouteDecision,
  type TemplateFields,
} from './fastTrack.js';
