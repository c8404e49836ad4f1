// Site fleet verification: reboot by environment tag, then wait for health
import {
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  RebootInstancesCommand
} from '@aws-sdk/client-ec2';
import type { Reservation } from '@aws-sdk/client-ec2';
import { ec2Client } from '../../shared/utils/aws-clients';
import { config } from '../../shared/utils/environment';
import { VerificationFailure, errorMessage } from '../../shared/utils/error-handling';
import type { ProgressChannel } from '../../shared/utils/progress-tracker';

const SOURCE = 'infra';
const SKIPPED_STATES = ['terminated', 'stopped'];

export type VerifierState = 'Idle' | 'RebootRequested' | 'PollingRunning' | 'PollingHealthy' | 'Done';

export interface InstanceResult {
  instanceId: string;
  reachedRunning: boolean;
  attempts: number;
  healthy: boolean;
  systemStatus?: string;
  instanceStatus?: string;
}

export type VerificationOutcome =
  | {
    status: 'success';
    state: 'Done';
    instanceIds: string[];
    instances: InstanceResult[];
  }
  | {
    status: 'failure';
    state: 'Done';
    failedIn: VerifierState;
    instanceIds: string[];
    instances: InstanceResult[];
    error: VerificationFailure;
  };

export interface InfraVerifierOptions {
  environmentName?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  signal?: AbortSignal;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function instancesOf(reservations: Reservation[] | undefined) {
  return (reservations ?? []).flatMap(reservation => reservation.Instances ?? []);
}

/**
 * Raised inside a state to end the run; carries the state it failed in
 */
class StateFailure extends Error {
  constructor(public readonly failedIn: VerifierState, public readonly failure: VerificationFailure) {
    super(failure.message);
  }
}

export class InfraVerifier {
  private readonly environmentName: string;
  private readonly pollIntervalMs: number;
  private readonly maxPollAttempts: number;
  private readonly signal?: AbortSignal;
  private current: VerifierState = 'Idle';
  private stopped = false;

  constructor(private readonly progress: ProgressChannel, options: InfraVerifierOptions = {}) {
    this.environmentName = options.environmentName ?? config.environmentName;
    this.pollIntervalMs = options.pollIntervalMs ?? config.pollIntervalMs;
    this.maxPollAttempts = options.maxPollAttempts ?? config.maxPollAttempts;
    this.signal = options.signal;
  }

  get state(): VerifierState {
    return this.current;
  }

  /**
   * Runs Idle -> RebootRequested -> PollingRunning -> PollingHealthy -> Done
   */
  async verify(): Promise<VerificationOutcome> {
    let instanceIds: string[] = [];
    let instances: InstanceResult[] = [];

    try {
      instanceIds = await this.findInstances();

      this.transition('RebootRequested', `Rebooting ${instanceIds.length} instance(s): ${instanceIds.join(', ')}`);
      await this.reboot(instanceIds);

      this.transition('PollingRunning', 'Waiting for instances to reach running state...');
      instances = await Promise.all(instanceIds.map(instanceId => this.waitForRunning(instanceId)));

      const stuck = instances.filter(instance => !instance.reachedRunning).map(instance => instance.instanceId);
      if (stuck.length > 0) {
        throw this.fail(`Instances did not reach running state: ${stuck.join(', ')}`);
      }

      this.transition('PollingHealthy', 'All instances running, checking status checks...');
      instances = await this.checkHealth(instances);
    } catch (error) {
      this.stopped = true;
      const failure = error instanceof StateFailure
        ? error
        : new StateFailure(this.current, new VerificationFailure(errorMessage(error), this.current, error));

      this.transition('Done', `Verification failed in ${failure.failedIn}: ${failure.message}`);
      console.error('Infrastructure verification failed', {
        environmentName: this.environmentName,
        failedIn: failure.failedIn,
        error: failure.message
      });

      return {
        status: 'failure',
        state: 'Done',
        failedIn: failure.failedIn,
        instanceIds,
        instances,
        error: failure.failure
      };
    }

    const unhealthy = instances.filter(instance => !instance.healthy);
    if (unhealthy.length > 0) {
      const failure = new VerificationFailure(
        `Unhealthy instances: ${unhealthy.map(instance => instance.instanceId).join(', ')}`,
        'PollingHealthy'
      );
      this.transition('Done', failure.message);
      return { status: 'failure', state: 'Done', failedIn: 'PollingHealthy', instanceIds, instances, error: failure };
    }

    this.transition('Done', `All ${instances.length} instance(s) are healthy.`);
    return { status: 'success', state: 'Done', instanceIds, instances };
  }

  private transition(next: VerifierState, message: string): void {
    this.current = next;
    this.progress.emit(SOURCE, `[${next}] ${message}`);
  }

  private fail(message: string, cause?: unknown): StateFailure {
    return new StateFailure(this.current, new VerificationFailure(message, this.current, cause));
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw this.fail('Verification cancelled');
    }
    if (this.stopped) {
      throw this.fail('Verification already failed');
    }
  }

  private async findInstances(): Promise<string[]> {
    if (this.environmentName.trim() === '') {
      throw this.fail('No environment name configured');
    }

    this.progress.emit(SOURCE, `Looking up instances tagged Name=${this.environmentName}...`);
    const response = await ec2Client.send(new DescribeInstancesCommand({
      Filters: [{ Name: 'tag:Name', Values: [this.environmentName] }]
    }));

    const instanceIds = instancesOf(response.Reservations)
      .filter(instance => !SKIPPED_STATES.includes(instance.State?.Name ?? ''))
      .map(instance => instance.InstanceId)
      .filter((instanceId): instanceId is string => typeof instanceId === 'string' && instanceId !== '');

    if (instanceIds.length === 0) {
      throw this.fail(`No instances found for environment '${this.environmentName}'`);
    }
    return instanceIds;
  }

  private async reboot(instanceIds: string[]): Promise<void> {
    try {
      await ec2Client.send(new RebootInstancesCommand({ InstanceIds: instanceIds }));
    } catch (error) {
      throw this.fail(`Reboot request failed: ${errorMessage(error)}`, error);
    }
    this.progress.emit(SOURCE, `Reboot request sent for instances: ${instanceIds.join(', ')}.`);
  }

  /**
   * Polls one instance until it reports running or the attempt ceiling is hit
   */
  private async waitForRunning(instanceId: string): Promise<InstanceResult> {
    for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
      this.throwIfCancelled();

      const response = await ec2Client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
      const stateName = instancesOf(response.Reservations)[0]?.State?.Name;

      if (stateName === 'running') {
        this.progress.emit(SOURCE, `Instance ${instanceId} is running (attempt ${attempt}).`);
        return { instanceId, reachedRunning: true, attempts: attempt, healthy: false };
      }

      if (attempt < this.maxPollAttempts) {
        await sleep(this.pollIntervalMs);
      }
    }

    this.progress.emit(SOURCE, `Instance ${instanceId} did not reach running after ${this.maxPollAttempts} attempts.`);
    return { instanceId, reachedRunning: false, attempts: this.maxPollAttempts, healthy: false };
  }

  private async checkHealth(instances: InstanceResult[]): Promise<InstanceResult[]> {
    const checked: InstanceResult[] = [];

    for (const instance of instances) {
      this.throwIfCancelled();

      const response = await ec2Client.send(new DescribeInstanceStatusCommand({
        InstanceIds: [instance.instanceId],
        IncludeAllInstances: true
      }));

      const status = response.InstanceStatuses?.[0];
      const systemStatus = status?.SystemStatus?.Status;
      const instanceStatus = status?.InstanceStatus?.Status;
      const healthy = status?.InstanceState?.Name === 'running' && systemStatus === 'ok' && instanceStatus === 'ok';

      this.progress.emit(
        SOURCE,
        `Instance ${instance.instanceId}: system=${systemStatus ?? 'unknown'}, instance=${instanceStatus ?? 'unknown'}${healthy ? '' : ' (unhealthy)'}`
      );
      checked.push({ ...instance, healthy, systemStatus, instanceStatus });
    }

    return checked;
  }
}

/**
 * Convenience wrapper used by the orchestrator and scripts
 */
export function verifyInfrastructure(progress: ProgressChannel, options: InfraVerifierOptions = {}): Promise<VerificationOutcome> {
  return new InfraVerifier(progress, options).verify();
}
