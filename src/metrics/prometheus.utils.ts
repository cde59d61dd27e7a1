import type { MetricSample } from './interfaces';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Formats a sample value the way the text exposition format expects.
 */
export function formatSampleValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Infinity) {
    return '+Inf';
  }
  if (value === -Infinity) {
    return '-Inf';
  }
  return String(value);
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/**
 * Renders samples as Prometheus text exposition format (version 0.0.4):
 * a `# HELP` and a `# TYPE` line before each sample, newline-terminated.
 */
export function renderPrometheusText(samples: readonly MetricSample[]): string {
  const lines: string[] = [];
  for (const sample of samples) {
    lines.push(`# HELP ${sample.name} ${escapeHelp(sample.help)}`);
    lines.push(`# TYPE ${sample.name} ${sample.type}`);
    lines.push(`${sample.name} ${formatSampleValue(sample.value)}`);
  }
  return `${lines.join('\n')}\n`;
}
