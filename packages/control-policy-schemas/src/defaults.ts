import type { AllocationPolicy, TemplateBaseline } from './types.js';

export const TEMPLATE_FIELD_COUNT = 8;

export const defaultTemplateBaseline: TemplateBaseline = Object.freeze({
  requiredFields: Object.freeze([
    'systemName',
    'systemOwner',
    'businessUnit',
    'description',
    'dataOwner',
    'hostingLocation',
    'userCount',
    'plannedEndDate',
  ]),
  controlCount: 20,
  loeLevel: 'A',
  reason: 'Fast-Track - Pre-approved Template Baseline',
});

export const defaultPolicy: AllocationPolicy = Object.freeze({
  version: '0.1',
  featureFlags: Object.freeze({ fastTrackEnabled: false }),
  templateBaseline: defaultTemplateBaseline,
});
