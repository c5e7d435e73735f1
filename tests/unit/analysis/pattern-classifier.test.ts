import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { PatternClassifier } from '../../../src/analysis/pattern-classifier.js';
import { DEFAULT_RULES } from '../../../src/analysis/correction-rules.js';
import { makeRecord } from '../../helpers/records.js';

describe('PatternClassifier.classifyMessage', () => {
  const classifier = new PatternClassifier();

  it.each([
    ['marker mismatch error', 'marker_mismatch'],
    ['incomplete marker found', 'incomplete_marker'],
    ['Invalid nesting of box inside bold', 'invalid_nesting'],
    ['invalid syntax detected', 'invalid_syntax'],
    ['missing closing element', 'missing_element'],
    ['Unknown keyword: blod', 'unknown_keyword'],
    ['bad colour value', 'invalid_color'],
    ['cannot decode byte 0x82', 'encoding_error'],
    ['EACCES: permission denied', 'permission_denied'],
    ['File not found: doc.txt', 'file_not_found'],
    ['out of memory', 'memory_pressure'],
    ['unknown error type', 'general_syntax'],
  ])('%s -> %s', (message, expected) => {
    expect(classifier.classifyMessage(message)).toBe(expected);
  });

  it('returns unknown for an empty message with no context', () => {
    expect(classifier.classifyMessage('  ')).toBe('unknown');
  });

  it('falls back to an unterminated marker in the context', () => {
    expect(classifier.classifyMessage('parse failure', '# bold text')).toBe('incomplete_marker');
  });

  it('does not treat a closed marker as incomplete', () => {
    expect(classifier.classifyMessage('parse failure', '# bold #')).toBe('general_syntax');
  });

  it('detects an attribute without a value', () => {
    expect(classifier.classifyMessage('oops', '# box color= #')).toBe('malformed_attribute');
  });
});

describe('PatternClassifier.addRule', () => {
  it('appends custom rules after the built-ins', () => {
    const classifier = new PatternClassifier();
    classifier.addRule('widget', 'widget_error', ['Check the widget']);
    classifier.addRule(/mismatch/, 'custom_mismatch');

    expect(classifier.rules()).toHaveLength(DEFAULT_RULES.length + 2);
    expect(classifier.classifyMessage('widget failed')).toBe('widget_error');
    expect(classifier.classifyMessage('marker mismatch')).toBe('marker_mismatch');
  });

  it('does not change the shared default table', () => {
    new PatternClassifier().addRule('x', 'x');
    expect(new PatternClassifier().rules()).toHaveLength(DEFAULT_RULES.length);
  });
});

describe('PatternClassifier.classify', () => {
  it('writes the pattern onto the record', () => {
    const record = makeRecord({ message: 'marker mismatch error' });
    expect(new PatternClassifier().classify(record)).toBe('marker_mismatch');
    expect(record.patternId).toBe('marker_mismatch');
  });

  it('keeps a pattern already assigned', () => {
    const record = makeRecord({ message: 'marker mismatch error' });
    record.assignPattern('manual');
    expect(new PatternClassifier().classify(record)).toBe('manual');
  });

  it('is idempotent for any message and context', () => {
    const classifier = new PatternClassifier();
    fc.assert(
      fc.property(fc.string(), fc.string(), (message, context) => {
        const record = makeRecord({ message, context });
        const first = classifier.classify(record);
        expect(classifier.classify(record)).toBe(first);
        expect(record.patternId).toBe(first);
      })
    );
  });
});
