import type { ProcessDirectory } from '../interfaces/process-directory';
import type { ProcessInstance } from '../types/process';
import { Outcome } from '../types/result';
import { SessionExpiredError, type FlowRelayError } from '../types/errors';
import type { FlowStateBus } from '../impl/flow-state-bus';
import { inlineScheduler, type UiScheduler } from '../interfaces/presenter';
import type { SessionGate, IndeterminatePolicy } from './session-gate';
import { createConsoleLogger, type Logger } from '../utils/logger';

/** Stored notification that points at a process instance. */
export interface ResumeNotification {
  instanceId: string;
  /** Consult the session gate first (default: true) */
  checkTokenExpiry?: boolean;
}

export interface NotificationResumerOptions {
  /** How to treat a session the token cannot vouch for */
  indeterminateSession: IndeterminatePolicy;
  /** Where bus publications run (default: inline) */
  scheduler?: UiScheduler;
  logger?: Logger;
}

/**
 * Pull a resume notification out of a loose push payload.
 * Accepts `instanceId` or `processId`.
 */
export function parseNotification(record: Readonly<Record<string, unknown>>): ResumeNotification | undefined {
  const id = [record.instanceId, record.processId].find(
    (value): value is string => typeof value === 'string' && value.trim() !== ''
  );
  if (id === undefined) return undefined;

  const notification: ResumeNotification = { instanceId: id };
  if (typeof record.checkTokenExpiry === 'boolean') {
    notification.checkTokenExpiry = record.checkTokenExpiry;
  }
  return notification;
}

/**
 * Resumes a process from a notification tap and hands the result to the host
 * through the FlowStateBus.
 */
export class NotificationResumer {
  private readonly log: Logger;
  private readonly policy: IndeterminatePolicy;
  private readonly scheduler: UiScheduler;

  constructor(
    private readonly directory: ProcessDirectory,
    private readonly gate: SessionGate,
    private readonly bus: FlowStateBus,
    options: NotificationResumerOptions
  ) {
    this.policy = options.indeterminateSession;
    this.scheduler = options.scheduler ?? inlineScheduler;
    this.log = options.logger ?? createConsoleLogger('NotificationResumer');
  }

  async resume(notification: ResumeNotification): Promise<Outcome<ProcessInstance, FlowRelayError>> {
    const { instanceId } = notification;
    const session = this.gate.require(notification.checkTokenExpiry ?? true, this.policy);

    if (!session.ok) {
      if (session.error instanceof SessionExpiredError) {
        this.log.info('Session expired; ending session', { instanceId });
        await this.publish(() => this.bus.endSession(), instanceId);
      } else {
        this.log.warn(`Not resuming: ${session.error.message}`, { instanceId });
      }
      return session;
    }

    const resumed = await this.directory.startOrResumeProcess(instanceId);
    if (!resumed.ok) {
      this.log.error(`Failed to resume process: ${resumed.error.message}`, { instanceId, code: resumed.error.code });
      return resumed;
    }

    await this.publish(() => this.bus.presentFlow(resumed.value), instanceId);
    return Outcome.ok(resumed.value);
  }

  private async publish(task: () => boolean, instanceId: string): Promise<void> {
    try {
      await this.scheduler.run(task);
    } catch (err) {
      this.log.error('Failed to publish on the flow state bus', {
        instanceId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
