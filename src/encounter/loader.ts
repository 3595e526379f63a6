import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { EncounterValidationError, StratlineError, type ValidationIssue } from '../errors.js';
import { createTimelineSession, inspectEncounter, type SessionOptions, type TimelineSession } from '../engine/session.js';
import { validateEncounter } from './schema.js';
import type { EncounterDocument } from './types.js';

export interface EncounterLoadSuccess {
  readonly encounter: EncounterDocument;
  readonly session: TimelineSession;
  /** Non-fatal issues (warnings) collected while loading. */
  readonly issues: ValidationIssue[];
  readonly sourceName?: string;
}

export type EncounterLoadResult =
  | ({ readonly kind: 'success' } & EncounterLoadSuccess)
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: ValidationIssue[] | undefined;
      /** Typed error behind the failure, when it was a structural one. */
      readonly error?: StratlineError;
      readonly sourceName?: string;
    };

/**
 * Parses, validates and builds a playback session. A load either succeeds
 * completely or returns an error result; nothing is partially loaded.
 */
export function loadEncounter(
  payload: unknown,
  sourceName?: string,
  options: SessionOptions = {},
): EncounterLoadResult {
  let encounter: EncounterDocument;
  let issues: ValidationIssue[];
  try {
    ({ encounter, issues } = validateEncounter(payload));
  } catch (error) {
    if (error instanceof EncounterValidationError) {
      return { kind: 'error', message: error.message, issues: error.issues, error, sourceName };
    }
    throw error;
  }

  const structural = inspectEncounter(encounter, options);
  const allIssues = [...issues, ...structural];
  const failure = structural.find((issue) => issue.severity === 'error');
  if (failure) {
    return {
      kind: 'error',
      message: failure.message,
      issues: allIssues,
      error: failure.error,
      sourceName,
    };
  }

  try {
    const session = createTimelineSession(encounter, options);
    return { kind: 'success', encounter, session, issues: allIssues, sourceName };
  } catch (error) {
    if (error instanceof StratlineError) {
      return { kind: 'error', message: error.message, issues: allIssues, error, sourceName };
    }
    throw error;
  }
}

export function loadEncounterFromJson(
  json: string,
  sourceName?: string,
  options: SessionOptions = {},
): EncounterLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON encounter',
      issues: undefined,
      sourceName,
    };
  }
  return loadEncounter(parsed, sourceName, options);
}

export async function loadEncounterFromFile(
  path: string,
  options: SessionOptions = {},
): Promise<EncounterLoadResult> {
  const json = await readFile(path, 'utf8');
  return loadEncounterFromJson(json, basename(path), options);
}
