import { describe, it, expect } from 'vitest';
import * as E from 'fp-ts/Either';
import { defaultPolicy, type AllocationPolicy } from '@control-alloc/policy-schemas';
import { createFastTrackGate, type RuleMatch } from '@control-alloc/rules';
import {
  createAllocationContext,
  describeRules,
  handleAllocate,
  type AllocationContext,
} from '../src/core/handlers.js';

const FAST_TRACK_POLICY: AllocationPolicy = {
  ...defaultPolicy,
  version: '1.0-ft',
  featureFlags: { fastTrackEnabled: true },
};

const TEMPLATE_FIELDS = {
  systemName: 'Intake Portal',
  systemOwner: 'J. Doe',
  businessUnit: 'Engineering',
  description: 'Pilot intake form',
  dataOwner: 'J. Doe',
  hostingLocation: 'On-prem',
  userCount: '25',
  plannedEndDate: '2026-12-31',
};

describe('handleAllocate', () => {
  const ctx = createAllocationContext(defaultPolicy);

  it('allocates through the rule chain when fast-track is disabled', () => {
    const res = handleAllocate({ selection: { pii: true, systemScope: 'External' } }, ctx);
    expect(res).toEqual(
      E.right({
        path: 'full',
        rule: 'external-sensitive',
        result: {
          controlCount: 70,
          loeLevel: 'D',
          reason: 'LOE D - External System (RTX Non-DFARS)',
        },
        policy_version: '0.1',
        ineligibility: 'disabled',
      })
    );
  });

  it('fails fast with INVALID_SELECTION on malformed input', () => {
    const res = handleAllocate({ selection: { systemScope: 'internal' } }, ctx);
    expect(E.isLeft(res)).toBe(true);
    if (E.isLeft(res)) {
      expect(res.left.code).toBe('INVALID_SELECTION');
    }
  });

  describe('with fast-track enabled', () => {
    const ftCtx = createAllocationContext(FAST_TRACK_POLICY);

    it('returns the template baseline for an eligible request', () => {
      const res = handleAllocate(
        { selection: { proprietary: true, systemScope: 'Internal' }, templateFields: TEMPLATE_FIELDS },
        ftCtx
      );
      expect(res).toEqual(
        E.right({
          path: 'fast-track',
          rule: 'fast-track-template',
          result: {
            controlCount: 20,
            loeLevel: 'A',
            reason: 'Fast-Track - Pre-approved Template Baseline',
          },
          policy_version: '1.0-ft',
        })
      );
    });

    it('lists missing template fields when falling back to the rule chain', () => {
      const res = handleAllocate(
        { selection: { publicData: true }, templateFields: { systemName: 'Intake Portal' } },
        ftCtx
      );
      expect(E.isRight(res)).toBe(true);
      if (E.isRight(res)) {
        expect(res.right.path).toBe('full');
        expect(res.right.rule).toBe('public-data');
        expect(res.right.result.controlCount).toBe(38);
        expect(res.right.ineligibility).toBe('missing-fields');
        expect(res.right.missing_fields).toHaveLength(7);
      }
    });

    it('never fast-tracks CUI', () => {
      const res = handleAllocate({ selection: { cui: true }, templateFields: TEMPLATE_FIELDS }, ftCtx);
      expect(E.isRight(res)).toBe(true);
      if (E.isRight(res)) {
        expect(res.right.rule).toBe('cui-override');
        expect(res.right.ineligibility).toBe('dfars-tier');
        expect(res.right.missing_fields).toBeUndefined();
      }
    });
  });

  it('reports the rule chosen by the gate explainer', () => {
    const pilotMatch: RuleMatch = {
      ruleId: 'pilot',
      rank: 4,
      result: { controlCount: 20, loeLevel: 'A', reason: 'LOE A - ATC (Pilot System)' },
    };
    const custom: AllocationContext = {
      policy: defaultPolicy,
      gate: createFastTrackGate(defaultPolicy.templateBaseline, () => pilotMatch),
    };

    const res = handleAllocate({ selection: { pii: true, systemScope: 'External' } }, custom);
    expect(res).toEqual(
      E.right({
        path: 'full',
        rule: 'pilot',
        result: pilotMatch.result,
        policy_version: '0.1',
        ineligibility: 'disabled',
      })
    );
  });
});

describe('describeRules', () => {
  it('lists the rule chain in priority order', () => {
    const rules = describeRules();
    expect(rules).toHaveLength(7);
    expect(rules[0]).toEqual({
      rank: 1,
      id: 'cui-override',
      controlCount: 110,
      loeLevel: 'DFARS',
      reason: 'CUI Override - Highest Security Level',
    });
    expect(rules.map((r) => r.controlCount)).toEqual([110, 110, 38, 20, 56, 70, 20]);
  });
});
