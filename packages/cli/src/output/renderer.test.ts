import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import type { AuditResult } from '@gitree/repo';
import { OutputRenderer, formatFinding, summaryLines } from './renderer';

const counters = { layoutViolations: 3, unterminatedNames: 1, nonBareTrees: 2, strayFiles: 5 };

describe('formatFinding', () => {
  it('formats layout findings as warnings in every mode', () => {
    expect(
      formatFinding(
        { type: 'LayoutViolation', repository: 'a.git', entry: 'x', path: 'a.git/x' },
        'layout',
      ),
    ).toBe('WARNING: a.git/x breaks Git repo layout rule');
    expect(formatFinding({ type: 'NameNotTerminated', path: 'srv/a' }, 'all')).toBe(
      'WARNING: srv/a name not terminated with .git',
    );
  });

  it('prints bare paths for single-check listings', () => {
    expect(formatFinding({ type: 'NonBareTree', path: 'srv/work' }, 'non-bare')).toBe('srv/work');
    expect(formatFinding({ type: 'StrayFile', path: 'srv/x.txt' }, 'stray')).toBe('srv/x.txt');
  });

  it('labels every line in a combined audit', () => {
    expect(formatFinding({ type: 'NonBareTree', path: 'srv/work' }, 'all')).toBe(
      'WARNING: srv/work non-bare git tree',
    );
    expect(formatFinding({ type: 'StrayFile', path: 'srv/x.txt' }, 'all')).toBe(
      'WARNING: srv/x.txt not in a git tree',
    );
  });
});

describe('summaryLines', () => {
  it('has two counters for layout and four for all', () => {
    expect(summaryLines(counters, 'layout')).toEqual([
      '3 files break Git repo layout rule',
      '1 git dirs name not terminated with .git',
    ]);
    expect(summaryLines(counters, 'all')).toHaveLength(4);
    expect(summaryLines(counters, 'all')[3]).toBe('5 files not in a git tree');
  });
});

describe('OutputRenderer', () => {
  let logSpy: MockInstance<Parameters<typeof console.log>, ReturnType<typeof console.log>>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const result = (mode: AuditResult['mode']): AuditResult => ({
    root: 'srv',
    mode,
    counters,
    findings: [],
  });

  it('streams findings in text mode', () => {
    const renderer = new OutputRenderer({ json: false, color: false });
    renderer.finding({ type: 'StrayFile', path: 'srv/x.txt' }, 'stray');
    expect(logSpy).toHaveBeenCalledWith('srv/x.txt');
  });

  it('holds findings back in JSON mode and prints the result once', () => {
    const renderer = new OutputRenderer({ json: true, color: false });
    renderer.finding({ type: 'StrayFile', path: 'srv/x.txt' }, 'stray');
    renderer.result(result('stray'));

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual(result('stray'));
  });

  it('prints the summary only for layout and combined audits', () => {
    const renderer = new OutputRenderer({ json: false, color: false });

    renderer.result(result('non-bare'));
    renderer.result(result('stray'));
    expect(logSpy).not.toHaveBeenCalled();

    renderer.result(result('layout'));
    expect(logSpy.mock.calls.map((c) => c[0])).toEqual([
      '\nCheck Result:',
      '3 files break Git repo layout rule',
      '1 git dirs name not terminated with .git',
    ]);
  });

  it('styles the heading when colour is enabled', () => {
    const renderer = new OutputRenderer({ json: false, color: true });
    renderer.result(result('layout'));
    expect(logSpy.mock.calls[0][0]).toBe('\n\x1b[1mCheck Result:\x1b[22m');
  });
});
