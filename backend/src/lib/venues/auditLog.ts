/**
 * Append-only audit trail of one reconciliation run: human-readable lines for
 * the operator plus the structured ChangeRecords behind them.
 */

import type { CatalogEntry, ChangeRecord, ScoredCandidate, VenueRecord } from '@pub-catalog/shared';
import type { ParseWarning } from '../errors.js';
import type { ReconcileReport } from './session.js';
import { renderStatsReport, renderTierTable } from './stats.js';

type Described = Pick<VenueRecord, 'name' | 'address'>;

export interface CandidateSummary extends ScoredCandidate {
  name: string;
  address: string;
}

function venueLabel(venue: Described): string {
  return `${venue.name || '(unnamed)'}, Address: ${venue.address || '(none)'}`;
}

/**
 * Transition lines for a change, in the wording operators grep for
 */
export function describeTransitions(change: ChangeRecord, venue: Described): string[] {
  const lines: string[] = [];
  if (change.tierTransition) {
    lines.push(
      change.tierTransition.to === 3
        ? `Promoted to Three-Star: ${venueLabel(venue)}`
        : `Demoted from Three-Star: ${venueLabel(venue)}`
    );
  }
  if (change.openTransition) {
    lines.push(`Three star ${change.openTransition.to ? 'opened' : 'closed'}: ${venueLabel(venue)}`);
  }
  return lines;
}

export class AuditLog {
  private readonly lines: string[] = [];
  private readonly changes: ChangeRecord[] = [];

  get entries(): readonly string[] {
    return this.lines;
  }

  get changeRecords(): readonly ChangeRecord[] {
    return this.changes;
  }

  line(text: string): void {
    this.lines.push(text);
  }

  recordWarning(warning: ParseWarning): void {
    this.line(`Warning [${warning.recordName}] ${warning.field}: ${warning.message}`);
  }

  recordCreated(entry: CatalogEntry): void {
    this.line(`Created ${entry.catalogId}: ${venueLabel(entry)}`);
  }

  recordChange(change: ChangeRecord, venue: Described): void {
    this.changes.push(change);
    this.line(`Updated ${change.catalogId}: ${venue.name || '(unnamed)'} (${change.fieldsChanged.join(', ')})`);
    for (const text of describeTransitions(change, venue)) {
      this.line(text);
    }
  }

  recordSkipped(record: Described, reason: string, candidates: CandidateSummary[] = []): void {
    this.line(`Skipped (${reason}): ${venueLabel(record)}`);
    candidates.forEach((candidate, i) => {
      this.line(
        `  ${i + 1}. [${candidate.catalogId}] score ${candidate.score}: ${candidate.name}, ${candidate.address}`
      );
    });
  }

  recordError(message: string): void {
    this.line(`Error: ${message}`);
  }
}

/**
 * Full log file for one run, ready to attach to the operator notification
 */
export function renderAuditLog(report: ReconcileReport): string {
  const { counts } = report;
  const lines = [
    `Venue import ${report.startedAt} (${report.mode}${report.dryRun ? ', dry run' : ''})`,
    `Records: ${counts.received} received, ${counts.created} created, ${counts.updated} updated, ` +
      `${counts.unchanged} unchanged, ${counts.skipped} skipped, ${counts.errored} errored`,
  ];
  if (report.aborted) {
    lines.push('Run was aborted before the end of the batch');
  }

  lines.push('', 'Incoming batch:', ...renderTierTable(report.batchStats).map((line) => `  ${line}`));
  lines.push('', 'Catalog:', ...renderStatsReport(report.statistics).map((line) => `  ${line}`));
  lines.push('', 'Log:', ...report.auditLines.map((line) => `  ${line}`));
  lines.push('', `Finished ${report.finishedAt}`);

  return lines.join('\n') + '\n';
}
