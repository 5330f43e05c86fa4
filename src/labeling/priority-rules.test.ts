import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  CYNICISM_OVERRIDE,
  MOBILIZATION_ENHANCEMENT,
  applyPriorityRules,
} from './priority-rules.js';
import type { DetectionResult, Label, LabelVerdict } from '../types/index.js';
import { mapLabels } from '../types/index.js';

function detectionsOf(labels: readonly Label[]): DetectionResult {
  return mapLabels(label => (labels.includes(label) ? [{ keyword: `kw-${label}`, offset: 0 }] : []));
}

function verdictOf(labels: readonly Label[]): LabelVerdict {
  return mapLabels(label => labels.includes(label));
}

describe('CYNICISM_OVERRIDE', () => {
  it('zeroes VP, E_ext, Norm and Mobi but keeps E_int and Info', () => {
    const all: Label[] = ['VP', 'E_int', 'E_ext', 'Cyn', 'Norm', 'Info', 'Mobi'];
    const outcome = CYNICISM_OVERRIDE.apply({ detections: detectionsOf(all), verdict: verdictOf(all) });

    assert.equal(outcome.fired, true);
    assert.deepEqual(outcome.verdict, verdictOf(['E_int', 'Cyn', 'Info']));
  });

  it('does not fire when nothing it overrides was positive', () => {
    const labels: Label[] = ['Cyn', 'E_int'];
    const outcome = CYNICISM_OVERRIDE.apply({ detections: detectionsOf(labels), verdict: verdictOf(labels) });

    assert.equal(outcome.fired, false);
    assert.deepEqual(outcome.verdict, verdictOf(labels));
  });

  it('does nothing when cynicism was negated', () => {
    const detected: Label[] = ['VP', 'Cyn', 'Mobi'];
    const outcome = CYNICISM_OVERRIDE.apply({
      detections: detectionsOf(detected),
      verdict: verdictOf(['VP', 'Mobi']),
    });

    assert.equal(outcome.fired, false);
    assert.deepEqual(outcome.verdict, verdictOf(['VP', 'Mobi']));
  });

  it('does nothing without a cynicism detection', () => {
    const labels: Label[] = ['VP', 'Norm'];
    const outcome = CYNICISM_OVERRIDE.apply({ detections: detectionsOf(labels), verdict: verdictOf(labels) });

    assert.equal(outcome.fired, false);
    assert.deepEqual(outcome.verdict, verdictOf(labels));
  });
});

describe('MOBILIZATION_ENHANCEMENT', () => {
  it('fires on VP and Mobi without cynicism and changes no label', () => {
    const labels: Label[] = ['VP', 'Mobi'];
    const outcome = MOBILIZATION_ENHANCEMENT.apply({ detections: detectionsOf(labels), verdict: verdictOf(labels) });

    assert.equal(outcome.fired, true);
    assert.deepEqual(outcome.verdict, verdictOf(labels));
  });

  it('fires when the detected cynicism was negated', () => {
    const outcome = MOBILIZATION_ENHANCEMENT.apply({
      detections: detectionsOf(['VP', 'Cyn', 'Mobi']),
      verdict: verdictOf(['VP', 'Mobi']),
    });
    assert.equal(outcome.fired, true);
  });

  it('does not fire when VP is false', () => {
    const labels: Label[] = ['Mobi'];
    const outcome = MOBILIZATION_ENHANCEMENT.apply({ detections: detectionsOf(labels), verdict: verdictOf(labels) });
    assert.equal(outcome.fired, false);
  });
});

describe('applyPriorityRules', () => {
  it('runs the cynicism override before the mobilization rule', () => {
    const labels: Label[] = ['VP', 'Cyn', 'Mobi'];
    const outcome = applyPriorityRules(detectionsOf(labels), verdictOf(labels));

    assert.deepEqual(outcome.fired, ['Cyn_overrides_positive']);
    assert.deepEqual(outcome.verdict, verdictOf(['Cyn']));
  });

  it('records the enhancement when no cynicism is present', () => {
    const labels: Label[] = ['VP', 'E_ext', 'Mobi'];
    const outcome = applyPriorityRules(detectionsOf(labels), verdictOf(labels));

    assert.deepEqual(outcome.fired, ['Mobi_enhances_VP']);
    assert.deepEqual(outcome.verdict, verdictOf(labels));
  });

  it('does not mutate the verdict it is given', () => {
    const labels: Label[] = ['VP', 'Cyn'];
    const verdict = verdictOf(labels);
    applyPriorityRules(detectionsOf(labels), verdict);

    assert.equal(verdict.VP, true);
  });

  it('returns the verdict unchanged with an empty rule list', () => {
    const labels: Label[] = ['VP', 'Cyn'];
    const outcome = applyPriorityRules(detectionsOf(labels), verdictOf(labels), []);

    assert.deepEqual(outcome.fired, []);
    assert.deepEqual(outcome.verdict, verdictOf(labels));
  });
});
