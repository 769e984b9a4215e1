/**
 * Tests for error to exit code mapping
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../cli/lib/config.js';
import { EXIT_CODES, exitCodeForError } from '../../../cli/lib/exit-codes.js';
import { DatasetLoadError, InvalidInputError, TriangulatorError } from '../../../core/errors.js';

describe('exitCodeForError', () => {
  it('maps rejected input to 2', () => {
    expect(exitCodeForError(new InvalidInputError('bad', 'invalid-direction', 0))).toBe(
      EXIT_CODES.INVALID_INPUT
    );
    expect(EXIT_CODES.INVALID_INPUT).toBe(2);
  });

  it('maps configuration problems to 3', () => {
    expect(exitCodeForError(new ConfigurationError('bad', '.triangulatorrc'))).toBe(3);
  });

  it('maps dataset problems to 5', () => {
    expect(exitCodeForError(new DatasetLoadError('bad', 'countries.json'))).toBe(5);
  });

  it('maps anything else to 1', () => {
    expect(exitCodeForError(new TriangulatorError('other'))).toBe(1);
    expect(exitCodeForError(new Error('boom'))).toBe(1);
    expect(exitCodeForError('string')).toBe(1);
  });
});
