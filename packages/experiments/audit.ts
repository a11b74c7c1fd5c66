/**
 * Audit sinks
 *
 * One TrialAssignment per completed call. Publishing is fire-and-forget: a
 * sink that throws or rejects is logged and counted, and the call it
 * describes is unaffected.
 */

import { getLogger, toError } from '@kernel/logger';
import { emitCounter } from '@kernel/metrics';

import type { TrialAssignment } from './types';

const logger = getLogger('ExperimentAudit');

export interface AuditSink {
  record(assignment: TrialAssignment): void | Promise<void>;
}

/**
 * Hand `assignment` to `sink` without waiting for it
 */
export function publishAssignment(sink: AuditSink, assignment: TrialAssignment): void {
  const onFailure = (error: unknown): void => {
    logger.warn('Audit sink failed', {
      experiment: assignment.experiment,
      executed: assignment.executedKey,
      error: toError(error).message,
    });
    emitCounter('experiment_audit_failures', 1, { service: assignment.service });
  };

  try {
    const pending = sink.record(assignment);
    if (pending instanceof Promise) {
      void pending.catch(onFailure);
    }
  } catch (error) {
    onFailure(error);
  }
}

/**
 * Keeps the most recent assignments, oldest dropped first
 */
export class InMemoryAuditSink implements AuditSink {
  private readonly entries: TrialAssignment[] = [];

  constructor(private readonly capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Audit buffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  record(assignment: TrialAssignment): void {
    this.entries.push(assignment);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  get assignments(): readonly TrialAssignment[] {
    return [...this.entries];
  }

  forExperiment(experiment: string): TrialAssignment[] {
    return this.entries.filter(a => a.experiment === experiment);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Writes each assignment as a structured log line. Fallbacks and failures
 * log at warn, routine calls at debug.
 */
export class LoggerAuditSink implements AuditSink {
  private readonly log = getLogger('ExperimentAssignments');

  record(assignment: TrialAssignment): void {
    const metadata = {
      experiment: assignment.experiment,
      service: assignment.service,
      method: assignment.methodName,
      selected: assignment.selectedKey,
      executed: assignment.executedKey,
      routing: assignment.routing,
      attempted: assignment.attemptedKeys,
      fallback: assignment.isFallback,
      durationMs: assignment.durationMs,
    };
    if (assignment.error !== undefined) {
      this.log.warn('Experiment call failed', { ...metadata, error: toError(assignment.error).message });
    } else if (assignment.isFallback) {
      this.log.warn('Experiment call recovered by fallback', metadata);
    } else {
      this.log.debug('Experiment call', metadata);
    }
  }
}

/**
 * Fans out to several sinks; one failing sink does not stop the others
 */
export class CompositeAuditSink implements AuditSink {
  private readonly sinks: readonly AuditSink[];

  constructor(sinks: readonly AuditSink[]) {
    this.sinks = [...sinks];
  }

  record(assignment: TrialAssignment): void {
    for (const sink of this.sinks) {
      publishAssignment(sink, assignment);
    }
  }
}
