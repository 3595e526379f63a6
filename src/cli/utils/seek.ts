import type { TimelineSession } from '../../engine/session.js';
import { TimelineManager, type SeekReport } from '../../engine/timelineManager.js';
import type { Logger } from '../../logging/logger.js';
import type { Vec2 } from '../../timeline/types.js';
import { jobAbbrev, jobRole, type JobRole } from '../../world/jobs.js';

export type SeekEntitySummary = {
  entityId: string;
  instanceKey: string;
  position: Vec2;
  rotation: number;
  visual: string;
  /** Job abbreviation and role, for players. */
  job?: { abbrev: string; role: JobRole };
};

export type SeekSummary = {
  timestamp: number;
  clamped: boolean;
  instanceKey: string;
  localTime: number;
  anchor?: string;
  exact: boolean;
  variations: Record<string, string>;
  entities: SeekEntitySummary[];
  warnings: string[];
  fingerprint: string;
};

const round = (value: number) => Math.round(value * 1000) / 1000;

export const summarizeSeek = (
  session: TimelineSession,
  manager: TimelineManager,
  report: SeekReport,
): SeekSummary => {
  const variations: Record<string, string> = {};
  for (const resolution of manager.registry.resolutions()) {
    variations[resolution.variationId] = resolution.value;
  }
  return {
    timestamp: report.timestamp,
    clamped: report.clamped,
    instanceKey: report.instanceKey,
    localTime: round(report.localTime),
    anchor: report.anchor,
    exact: report.exact,
    variations,
    entities: manager.projection.entries().map((entry) => {
      const summary: SeekEntitySummary = {
        entityId: entry.entityId,
        instanceKey: entry.instanceKey,
        position: { x: round(entry.state.position.x), y: round(entry.state.position.y) },
        rotation: round(entry.state.rotation),
        visual: entry.state.visual,
      };
      const job = session.world.entity(entry.entityId)?.job;
      if (job) {
        summary.job = { abbrev: jobAbbrev(job), role: jobRole(job) };
      }
      return summary;
    }),
    warnings: report.warnings.map((warning) => warning.message),
    fingerprint: manager.projection.fingerprint(),
  };
};

/** One full seek from a fresh projection, as the `seek` command performs it. */
export const runSeek = (session: TimelineSession, at: number, logger?: Logger): SeekSummary => {
  const manager = new TimelineManager(session, { logger });
  try {
    return summarizeSeek(session, manager, manager.seek(at));
  } finally {
    manager.dispose();
  }
};

export const formatSeekSummary = (summary: SeekSummary): string[] => {
  const lines = [
    `✔ t=${summary.timestamp}s${summary.clamped ? ' (clamped)' : ''} in ${summary.instanceKey} @ ${summary.localTime}s`,
    `  anchor: ${summary.anchor ?? 'none'}${summary.exact ? ' (exact)' : ''}`,
  ];
  const variations = Object.entries(summary.variations);
  lines.push(
    variations.length === 0
      ? '  variations: none resolved'
      : `  variations: ${variations.map(([id, value]) => `${id}=${value}`).join(', ')}`,
  );
  lines.push(`  entities (${summary.entities.length}):`);
  for (const entity of summary.entities) {
    const job = entity.job ? ` ${entity.job.abbrev}/${entity.job.role}` : '';
    lines.push(
      `    ${entity.entityId.padEnd(12)} (${entity.position.x}, ${entity.position.y}) rot ${entity.rotation} ${entity.visual}${job} [${entity.instanceKey}]`,
    );
  }
  for (const warning of summary.warnings) {
    lines.push(`  ! ${warning}`);
  }
  return lines;
};
