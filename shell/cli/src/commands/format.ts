// cli/src/commands/format.ts - Human and --quiet renderings of fetch results

import { formatCoordinate, type FetchResult } from '@skycut/contracts';

export function describeResult(result: FetchResult): string[] {
  const { image } = result;
  const via = result.surveyUsed && image
    ? ` via ${result.surveyUsed} (${image.width}x${image.height})`
    : '';
  const lines = [`${result.label}: ${result.status}${via}`];

  if (result.coordinate) {
    lines.push(`  position: ${formatCoordinate(result.coordinate)}`);
  }
  if (result.attempts.length > 0) {
    lines.push(`  attempts: ${result.attempts.map(a => `${a.survey}=${a.outcome}`).join(', ')}`);
  }
  if (result.error) {
    lines.push(`  error: ${result.error.message}`);
  }
  return lines;
}

/** One tab-separated line: label, status, survey used */
export function quietLine(result: FetchResult): string {
  return `${result.label}\t${result.status}\t${result.surveyUsed ?? '-'}`;
}

export function resultRow(index: number, result: FetchResult): string[] {
  return [
    String(index + 1),
    result.label,
    result.status,
    result.surveyUsed ?? '-',
    result.coordinate ? formatCoordinate(result.coordinate) : '-',
  ];
}
