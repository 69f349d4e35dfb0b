import type { CheckResult, ValidationReport } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

export interface CheckResultJson {
  check_id: string;
  severity: string;
  level: string | null;
  subject?: string;
  fail_count: number;
  messages: string[];
}

export interface ValidationReportJson {
  metadata: {
    source_type: string;
    source_kind: string;
    year: number;
    file: string;
    generated_at: string;
  };
  summary: {
    total: number;
    passed: number;
    with_warnings: number;
    with_errors: number;
    error_count: number;
    warning_count: number;
  };
  passed_checks: CheckResultJson[];
  warning_checks: CheckResultJson[];
  error_checks: CheckResultJson[];
}

const resultToJson = (result: CheckResult): CheckResultJson => ({
  check_id: result.checkId,
  severity: result.severity,
  level: result.level,
  ...(result.subject !== null && { subject: result.subject }),
  fail_count: result.failCount,
  messages: [...result.messages],
});

export const toJson = (report: ValidationReport): ValidationReportJson => {
  const { metadata, summary, results } = report;
  return {
    metadata: {
      source_type: metadata.sourceType,
      source_kind: metadata.sourceKind,
      year: metadata.year,
      file: metadata.file,
      generated_at: metadata.generatedAt,
    },
    summary: {
      total: summary.total,
      passed: summary.passed,
      with_warnings: summary.withWarnings,
      with_errors: summary.withErrors,
      error_count: summary.errorCount,
      warning_count: summary.warningCount,
    },
    passed_checks: results.filter((result) => result.passed).map(resultToJson),
    warning_checks: results
      .filter((result) => !result.passed && result.severity === 'warning')
      .map(resultToJson),
    error_checks: results
      .filter((result) => !result.passed && result.severity === 'error')
      .map(resultToJson),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Markdown
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `check_id (level, subject)`, omitting what is null.
 */
export const resultTitle = (result: CheckResult): string => {
  const scope = [result.level, result.subject].filter((part) => part !== null);
  return scope.length > 0 ? `${result.checkId} (${scope.join(', ')})` : result.checkId;
};

const failedSection = (heading: string, results: readonly CheckResult[]): string[] => {
  const lines = [`## ${heading}`, ''];
  if (results.length === 0) {
    lines.push('None.', '');
    return lines;
  }
  for (const result of results) {
    lines.push(`### ${resultTitle(result)}`, '', `Failures: ${String(result.failCount)}`, '');
    for (const message of result.messages) {
      lines.push(`- ${message}`);
    }
    if (result.messages.length > 0) {
      lines.push('');
    }
  }
  return lines;
};

export const toMarkdown = (report: ValidationReport): string => {
  const { metadata, summary, results } = report;
  const passed = results.filter((result) => result.passed);

  const lines = [
    `# Validation report: ${String(metadata.year)} ${metadata.sourceType}`,
    '',
    `- Source kind: ${metadata.sourceKind}`,
    `- File: ${metadata.file}`,
    `- Generated at: ${metadata.generatedAt}`,
    '',
    '## Summary',
    '',
    '| Checks | Passed | With warnings | With errors | Errors | Warnings |',
    '|---|---|---|---|---|---|',
    `| ${[
      summary.total,
      summary.passed,
      summary.withWarnings,
      summary.withErrors,
      summary.errorCount,
      summary.warningCount,
    ]
      .map(String)
      .join(' | ')} |`,
    '',
    ...failedSection(
      'Errors',
      results.filter((result) => !result.passed && result.severity === 'error')
    ),
    ...failedSection(
      'Warnings',
      results.filter((result) => !result.passed && result.severity === 'warning')
    ),
    '## Passed checks',
    '',
    ...(passed.length > 0 ? passed.map((result) => `- ${resultTitle(result)}`) : ['None.']),
  ];

  return `${lines.join('\n')}\n`;
};

// ─────────────────────────────────────────────────────────────────────────────
// Console
// ─────────────────────────────────────────────────────────────────────────────

export const toConsoleSummary = (report: ValidationReport): string => {
  const { metadata, summary } = report;
  return [
    'Validation Summary:',
    `  Source: ${String(metadata.year)} ${metadata.sourceType} (${metadata.file})`,
    `  Checks: ${String(summary.total)} total, ${String(summary.passed)} passed, ${String(summary.total - summary.passed)} failed`,
    `  Errors: ${String(summary.errorCount)}`,
    `  Warnings: ${String(summary.warningCount)}`,
  ].join('\n');
};
