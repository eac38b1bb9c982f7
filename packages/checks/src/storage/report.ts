import { worstSeverity } from '@storagecheck/shared';
import type { CheckReport, Classification } from '../types.js';
import { tallyEntries } from './tally.js';

/**
 * Aggregates a classification. Overall severity is the worst result, OK
 * when nothing was classified. The message is the summary line followed
 * by one `[SEVERITY] message` line per result.
 */
export function buildReport(classification: Classification, label: string): CheckReport {
  const { results, tally, total } = classification;
  const severity = worstSeverity(results.map((r) => r.severity));

  const summary = [
    `${label} ${total}`,
    ...tallyEntries(tally).map(([key, count]) => `${key}: ${count}`),
  ].join('; ');
  const details = results.map((r) => `[${r.severity}] ${r.message}`);
  const message = details.length > 0 ? `${summary}\n${details.join('\n')}` : summary;

  return { severity, summary, details, message };
}
