import pc from 'picocolors';
import type { AuditCounters, AuditMode, AuditResult, Finding } from '@gitree/repo';

export interface RendererOptions {
  json: boolean;
  color: boolean;
}

/**
 * One line per finding. A combined audit labels every line since the
 * kinds are interleaved; single-check listings print bare paths.
 */
export function formatFinding(finding: Finding, mode: AuditMode): string {
  switch (finding.type) {
    case 'LayoutViolation':
      return `WARNING: ${finding.path} breaks Git repo layout rule`;
    case 'NameNotTerminated':
      return `WARNING: ${finding.path} name not terminated with .git`;
    case 'NonBareTree':
      return mode === 'all' ? `WARNING: ${finding.path} non-bare git tree` : finding.path;
    case 'StrayFile':
      return mode === 'all' ? `WARNING: ${finding.path} not in a git tree` : finding.path;
  }
}

export function summaryLines(counters: AuditCounters, mode: AuditMode): string[] {
  const lines = [
    `${counters.layoutViolations} files break Git repo layout rule`,
    `${counters.unterminatedNames} git dirs name not terminated with .git`,
  ];
  if (mode === 'all') {
    lines.push(
      `${counters.nonBareTrees} git dirs non-bare git tree`,
      `${counters.strayFiles} files not in a git tree`,
    );
  }
  return lines;
}

export class OutputRenderer {
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(private readonly options: RendererOptions) {
    this.colors = pc.createColors(options.color);
  }

  /** Streams a finding; JSON output is written once, by `result`. */
  finding(finding: Finding, mode: AuditMode): void {
    if (this.options.json) return;
    console.log(formatFinding(finding, mode));
  }

  result(result: AuditResult): void {
    if (this.options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    if (result.mode !== 'layout' && result.mode !== 'all') return;

    console.log(`\n${this.colors.bold('Check Result:')}`);
    for (const line of summaryLines(result.counters, result.mode)) {
      console.log(line);
    }
  }
}
