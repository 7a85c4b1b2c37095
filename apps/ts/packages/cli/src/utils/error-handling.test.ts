import { TransportError } from '@flexreport/shared';
import ora from 'ora';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CLIError,
  CLINotFoundError,
  CLIValidationError,
  displayTroubleshootingTips,
  formatErrorMessage,
  handleCommandError,
  PERSPECTIVE_TIPS,
  REPORT_TIPS,
} from './error-handling.js';

function createSpinner() {
  const spinner = ora({ isEnabled: false, isSilent: true });
  return {
    spinner,
    fail: vi.spyOn(spinner, 'fail'),
    stop: vi.spyOn(spinner, 'stop'),
  };
}

function errorLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => String(call[0] ?? ''));
}

describe('error-handling utilities', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('provides structured CLI error classes', () => {
    const base = new CLIError('base');
    expect(base.name).toBe('CLIError');
    expect(base.exitCode).toBe(1);
    expect(base.silent).toBe(false);

    const validation = new CLIValidationError('invalid input');
    expect(validation.name).toBe('CLIValidationError');
    expect(validation.exitCode).toBe(1);

    expect(new CLINotFoundError('missing').name).toBe('CLINotFoundError');
  });

  it('prints troubleshooting tips in consistent format', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    displayTroubleshootingTips(['Tip A', 'Tip B']);

    const lines = errorLines(errorSpy);
    expect(lines[0]).toContain('Troubleshooting tips');
    expect(lines[1]).toContain('   • Tip A');
    expect(lines[2]).toContain('   • Tip B');
  });

  it('names the stage and job for FlexReport errors', () => {
    const error = new TransportError('HTTP 502: Bad Gateway', {
      stage: 'submit',
      job: { name: 'Daily Cost', handle: 'h-1' },
    });
    expect(formatErrorMessage(error)).toBe('submit failed for "Daily Cost": HTTP 502: Bad Gateway');
    expect(formatErrorMessage(new Error('plain'))).toBe('plain');
    expect(formatErrorMessage(42)).toBe('42');
  });

  it('rethrows existing CLIError without wrapping', () => {
    const { spinner, fail, stop } = createSpinner();
    const original = new CLIValidationError('invalid');

    expect(() => handleCommandError(original, spinner, { failMessage: 'should not be used' })).toThrow(original);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(fail).not.toHaveBeenCalled();
  });

  it('wraps other errors in a silent CLIError after printing details', () => {
    const { spinner, fail } = createSpinner();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const originalError = new Error('request failed');
    originalError.stack = 'stack trace for debug';

    let thrown: unknown;
    try {
      handleCommandError(originalError, spinner, {
        failMessage: 'Operation failed',
        debug: true,
        tips: ['custom tip'],
      });
    } catch (error) {
      thrown = error;
    }

    expect(fail).toHaveBeenCalledWith('Operation failed');
    expect(thrown).toBeInstanceOf(CLIError);
    expect(thrown).toMatchObject({ message: 'request failed', silent: true, exitCode: 1 });

    const lines = errorLines(errorSpy);
    expect(lines.some((line) => line.includes('Error: request failed'))).toBe(true);
    expect(lines.some((line) => line.includes('stack trace for debug'))).toBe(true);
    expect(lines.some((line) => line.includes('custom tip'))).toBe(true);
  });

  it('uses default tips when none are given', () => {
    const { spinner } = createSpinner();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => handleCommandError('plain failure', spinner, { failMessage: 'Failed' })).toThrow(CLIError);

    const lines = errorLines(errorSpy);
    expect(lines.some((line) => line.includes('CLOUDHEALTH_API_KEY'))).toBe(true);
  });

  it('exports tips for every command group', () => {
    for (const tips of [...Object.values(REPORT_TIPS), ...Object.values(PERSPECTIVE_TIPS)]) {
      expect(tips.length).toBeGreaterThan(0);
    }
  });
});
