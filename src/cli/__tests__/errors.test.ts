/**
 * @fileoverview Tests for structured CLI errors
 */

import { describe, it, expect } from 'vitest';
import {
  HostProtocolError,
  HostUnavailableError,
  InputValidationError,
  ScriptFaultError,
} from '../../core/errors.js';
import {
  CliError,
  ErrorCodes,
  ErrorMetadata,
  classifyError,
  createError,
  createErrorEnvelope,
  faultToError,
  formatError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  isErrorEnvelope,
  isRetryableError,
  type ErrorEnvelope,
} from '../errors.js';

describe('ErrorEnvelope', () => {
  it('fills retryability and hints from the code', () => {
    const envelope = createErrorEnvelope('EHOST_NOT_RUNNING', 'InDesign is not running');

    expect(envelope.code).toBe('EHOST_NOT_RUNNING');
    expect(envelope.retryable).toBe(true);
    expect(envelope.recoveryHints).toEqual(ErrorMetadata.EHOST_NOT_RUNNING.recoveryHints);
    expect(typeof envelope.context?.timestamp).toBe('string');
  });

  it('allows overriding the defaults', () => {
    const envelope = createErrorEnvelope('ESCRIPT_FAULT', 'boom', {
      retryable: true,
      recoveryHints: ['Custom hint'],
      context: { line: 4 },
    });

    expect(envelope.retryable).toBe(true);
    expect(envelope.recoveryHints).toEqual(['Custom hint']);
    expect(envelope.context?.line).toBe(4);
  });

  it('recognizes envelopes', () => {
    expect(isErrorEnvelope({ code: 'X', message: 'Y', retryable: false, recoveryHints: [] })).toBe(true);
    expect(isErrorEnvelope({ code: 'X', message: 'Y', retryable: false })).toBe(false);
    expect(isErrorEnvelope(null)).toBe(false);
    expect(isErrorEnvelope(new CliError('m', 'EUNKNOWN'))).toBe(false);
  });

  it('has metadata for every code', () => {
    expect(Object.keys(ErrorMetadata)).toEqual(Object.keys(ErrorCodes));
    for (const metadata of Object.values(ErrorMetadata)) {
      expect(metadata.recoveryHints.length).toBeGreaterThan(0);
    }
  });
});

describe('CliError', () => {
  it('puts its own suggestion first', () => {
    const envelope = new CliError('run needs a script file', 'EINVALID_ARGUMENT', 'Usage: indesign-exec run <file>').toEnvelope();

    expect(envelope.recoveryHints[0]).toBe('Usage: indesign-exec run <file>');
    expect(envelope.recoveryHints.slice(1)).toEqual(ErrorMetadata.EINVALID_ARGUMENT.recoveryHints);
  });

  it('carries details into the context', () => {
    const envelope = createError('EFILE_NOT_FOUND', 'Cannot read a.jsx', { file: 'a.jsx' }).toEnvelope();

    expect(envelope.context?.file).toBe('a.jsx');
  });
});

describe('faultToError', () => {
  it.each([
    ['not_running', 'EHOST_NOT_RUNNING'],
    ['disconnected', 'EHOST_DISCONNECTED'],
    ['no_document', 'ENO_DOCUMENT'],
  ] as const)('maps host_unreachable/%s to %s', (reason, code) => {
    const error = faultToError({ status: 'fault', kind: 'host_unreachable', faultDescription: 'x', reason });

    expect(error.code).toBe(code);
  });

  it('keeps the script error name and line', () => {
    const error = faultToError({
      status: 'fault',
      kind: 'script',
      faultDescription: 'x is undefined',
      errorName: 'ReferenceError',
      line: 2,
    });

    expect(error.code).toBe('ESCRIPT_FAULT');
    expect(error.details).toEqual({ errorName: 'ReferenceError', line: 2 });
  });

  it('maps validation and internal faults', () => {
    expect(faultToError({ status: 'fault', kind: 'validation', faultDescription: 'x' }).code).toBe('EINVALID_ARGUMENT');
    expect(faultToError({ status: 'fault', kind: 'internal', faultDescription: 'x' }).code).toBe('EUNKNOWN');
  });
});

describe('classifyError', () => {
  it('passes envelopes through unchanged', () => {
    const original: ErrorEnvelope = { code: 'ENO_DOCUMENT', message: 'Test', retryable: false, recoveryHints: ['hint'] };

    expect(classifyError(original)).toEqual(original);
  });

  it('classifies host errors by reason', () => {
    const envelope = classifyError(new HostUnavailableError('no_document', 'No document is open in InDesign', 'T'));

    expect(envelope.code).toBe('ENO_DOCUMENT');
    expect(envelope.context).toMatchObject({ reason: 'no_document', target: 'T' });
  });

  it('classifies script, protocol and validation errors', () => {
    expect(classifyError(new ScriptFaultError('boom', 'Error', 1)).code).toBe('ESCRIPT_FAULT');
    expect(classifyError(new HostProtocolError('Host reply is not JSON')).code).toBe('EHOST_PROTOCOL');
    expect(classifyError(new InputValidationError('bad')).code).toBe('EINVALID_ARGUMENT');
    expect(classifyError(new InputValidationError('Invalid environment configuration: X: y')).code).toBe(
      'ECONFIG_INVALID'
    );
  });

  it('classifies missing files', () => {
    expect(classifyError(new Error("ENOENT: no such file or directory, open 'a.jsx'")).code).toBe('EFILE_NOT_FOUND');
  });

  it('falls back to EUNKNOWN', () => {
    const envelope = classifyError('string error');

    expect(envelope.code).toBe('EUNKNOWN');
    expect(envelope.message).toBe('string error');
    expect(isRetryableError(envelope)).toBe(true);
  });
});

describe('getExitCode', () => {
  it('returns the code family exit status', () => {
    expect(getExitCode(createErrorEnvelope('EHOST_NOT_RUNNING', 'x'))).toBe(10);
    expect(getExitCode(createErrorEnvelope('ENO_DOCUMENT', 'x'))).toBe(12);
    expect(getExitCode(createErrorEnvelope('ESCRIPT_FAULT', 'x'))).toBe(20);
    expect(getExitCode(createErrorEnvelope('EINVALID_ARGUMENT', 'x'))).toBe(50);
  });

  it('returns 1 for unknown and unmapped codes', () => {
    expect(getExitCode(createErrorEnvelope('EUNKNOWN', 'x'))).toBe(1);
    expect(getExitCode({ code: 'CUSTOM', message: 'x', retryable: false, recoveryHints: [] })).toBe(1);
  });
});

describe('formatting', () => {
  it('formats a one-line error', () => {
    expect(formatError(new CliError('bad steps', 'EINVALID_ARGUMENT'))).toBe('Error [EINVALID_ARGUMENT]: bad steps');
  });

  it('includes the line, hints and retryability', () => {
    const text = formatErrorWithHints({
      code: 'ESCRIPT_FAULT',
      message: 'x is undefined',
      retryable: true,
      recoveryHints: ['Fix it'],
      context: { line: 7 },
    });

    expect(text).toBe(
      [
        'Error [ESCRIPT_FAULT]: x is undefined',
        '  at line 7',
        '',
        'Recovery suggestions:',
        '  - Fix it',
        '',
        'This error is retryable.',
      ].join('\n')
    );
  });

  it('wraps the envelope for JSON output', () => {
    const parsed = JSON.parse(formatErrorJson(createErrorEnvelope('ENO_DOCUMENT', 'No document')));

    expect(parsed.error).toMatchObject({ code: 'ENO_DOCUMENT', message: 'No document', retryable: false });
  });
});
