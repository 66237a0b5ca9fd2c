import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CheckCategory, CheckResult, QualityReport, SampleRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const RULE = '='.repeat(70);

/**
 * Plain-text report: every check grouped by category with its failing
 * record count, samples under the failing checks, then a closing summary.
 */
export function formatQualityReport(report: QualityReport): string {
    const lines: string[] = [
        RULE,
        'DATA QUALITY REPORT',
        `Started: ${report.startedAt.toISOString()}`,
        `Duration: ${(report.duration / 1000).toFixed(2)}s`,
        RULE,
    ];

    for (const [category, results] of groupByCategory(report.results)) {
        lines.push('', category, '-'.repeat(category.length));
        for (const result of results) {
            lines.push(...formatCheck(result));
        }
    }

    const failed = report.results.filter((r) => !r.passed);
    lines.push(
        '',
        RULE,
        `Total checks: ${report.results.length}`,
        `Passed: ${report.results.length - failed.length}`,
        `Failed: ${failed.length}`,
        `Overall: ${report.passed ? 'PASSED' : 'FAILED'}`,
        RULE
    );

    return lines.join('\n');
}

/**
 * Print the report and, with `outputFile`, write it there too.
 */
export function writeQualityReport(report: QualityReport, outputFile?: string): string {
    const text = formatQualityReport(report);
    process.stdout.write(`${text}\n`);

    if (outputFile) {
        mkdirSync(dirname(outputFile), { recursive: true });
        writeFileSync(outputFile, `${text}\n`, 'utf-8');
        getLogger().info({ path: outputFile }, 'Quality report written');
    }

    return text;
}

function formatCheck(result: CheckResult): string[] {
    const status = result.error ? 'ERROR' : result.passed ? 'PASS' : 'FAIL';
    const lines = [`[${status}] ${result.id} ${result.name} (${result.executionTime.toFixed(1)}ms)`];

    if (result.error) {
        lines.push(`    ${result.error}`);
    } else {
        lines.push(`    ${result.failureCount} failing record(s)`);
        for (const sample of result.samples) {
            lines.push(`    - ${formatSample(sample)}`);
        }
    }

    return lines;
}

function formatSample(sample: SampleRecord): string {
    return Object.entries(sample)
        .map(([key, value]) => `${key}=${value === null ? 'null' : String(value)}`)
        .join(', ');
}

function groupByCategory(results: readonly CheckResult[]): Map<CheckCategory, CheckResult[]> {
    const groups = new Map<CheckCategory, CheckResult[]>();
    for (const result of results) {
        const group = groups.get(result.category);
        if (group) {
            group.push(result);
        } else {
            groups.set(result.category, [result]);
        }
    }
    return groups;
}
