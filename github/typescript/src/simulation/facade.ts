/**
 * Snapshot-backed Projects client.
 * @module simulation/facade
 */

import type { Logger } from '../observability/logging.js';
import { logError, NoopLogger } from '../observability/logging.js';
import type { ProjectsClient } from '../projects/client.js';
import { GitHubProjectsClient } from '../projects/github-client.js';
import type { ContentRecord, Project, ProjectField, ProjectFieldValue } from '../types.js';
import { resolveSimulationConfig, type SimulationConfig, type SimulationSettings } from './config.js';
import { SimulationError, SimulationErrorKind } from './errors.js';
import { CallRecorder } from './recorder.js';
import { RecordingProjectsClient } from './recording-client.js';
import { CallReplayer } from './replayer.js';
import { ReplayingProjectsClient } from './replaying-client.js';
import { SnapshotStore } from './storage.js';
import {
  createSnapshot,
  SimulationMode,
  type Interaction,
  type MatchPolicy,
  type Snapshot,
} from './types.js';

/**
 * Lifecycle of a {@link SnapshotProjectsClient}.
 */
export enum SnapshotClientState {
  Uninitialized = 'uninitialized',
  Loaded = 'loaded',
  Closed = 'closed',
}

/**
 * Live client, or a factory for one. The factory runs only in record and
 * bypass mode.
 */
export type ProjectsClientSource = ProjectsClient | (() => ProjectsClient);

export interface SnapshotProjectsClientOptions {
  /** Scenario name; determines the snapshot file. */
  scenario: string;
  /** Mode, directory and match policy. Defaults to replay from `testdata/snapshots`. */
  settings?: SimulationSettings;
  /** Defaults to `GitHubProjectsClient.fromEnv()`. */
  client?: ProjectsClientSource;
  store?: SnapshotStore;
  logger?: Logger;
  /** Clock for snapshot and interaction timestamps. */
  now?: () => Date;
}

interface Session {
  config: SimulationConfig;
  scenario: string;
  snapshotPath: string;
  variant: ProjectsClient;
  snapshot?: Snapshot;
  replayer?: CallReplayer;
  store: SnapshotStore;
  logger: Logger;
}

function resolveClient(source: ProjectsClientSource | undefined, logger: Logger): ProjectsClient {
  if (source === undefined) {
    return GitHubProjectsClient.fromEnv({ logger });
  }
  return typeof source === 'function' ? source() : source;
}

async function openSession(
  base: Omit<Session, 'variant' | 'snapshot' | 'replayer'>,
  options: SnapshotProjectsClientOptions,
  now: () => Date
): Promise<Session> {
  const { config, logger, scenario } = base;
  switch (config.mode) {
    case SimulationMode.Replay: {
      const loaded = await base.store.load(base.snapshotPath);
      const snapshot = { ...loaded, testName: loaded.testName || scenario };
      const replayer = new CallReplayer(snapshot, { matchPolicy: config.matchPolicy, logger });
      logger.debug('Loaded snapshot', { scenario, calls: snapshot.calls.length });
      return { ...base, snapshot, replayer, variant: new ReplayingProjectsClient(replayer) };
    }
    case SimulationMode.Record: {
      const snapshot = createSnapshot(scenario, now());
      const recorder = new CallRecorder(snapshot, { logger, now });
      const live = resolveClient(options.client, logger);
      return { ...base, snapshot, variant: new RecordingProjectsClient(live, recorder) };
    }
    case SimulationMode.Bypass:
      return { ...base, variant: resolveClient(options.client, logger) };
  }
}

/**
 * {@link ProjectsClient} that records, replays or passes through every call
 * depending on its mode.
 *
 * @example
 * ```typescript
 * const client = await SnapshotProjectsClient.open({
 *   scenario: 'import-draft-issues',
 *   settings: simulationSettingsFromEnv(),
 * });
 * try {
 *   const project = await client.findProject('octo-org/Roadmap');
 *   const fields = await client.getProjectFields(project.id);
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class SnapshotProjectsClient implements ProjectsClient {
  private currentState = SnapshotClientState.Uninitialized;

  private constructor(private readonly session: Session) {}

  /**
   * Resolves the mode and prepares the snapshot.
   *
   * @throws {SimulationError} In replay mode, when the snapshot is missing or
   *   malformed.
   */
  static async open(options: SnapshotProjectsClientOptions): Promise<SnapshotProjectsClient> {
    const config = resolveSimulationConfig(options.settings);
    const logger = options.logger ?? new NoopLogger();
    const store = options.store ?? new SnapshotStore();
    const now = options.now ?? (() => new Date());
    const snapshotPath = store.derivePath(options.scenario, config.snapshotDirectory);
    const base = { config, scenario: options.scenario, snapshotPath, store, logger };

    logger.debug('Opening snapshot client', {
      scenario: options.scenario,
      mode: config.mode,
      matchPolicy: config.matchPolicy,
      path: snapshotPath,
    });

    const session = await openSession(base, options, now);
    const client = new SnapshotProjectsClient(session);
    client.currentState = SnapshotClientState.Loaded;
    return client;
  }

  get mode(): SimulationMode {
    return this.session.config.mode;
  }

  get matchPolicy(): MatchPolicy {
    return this.session.config.matchPolicy;
  }

  get scenario(): string {
    return this.session.scenario;
  }

  get snapshotPath(): string {
    return this.session.snapshotPath;
  }

  get state(): SnapshotClientState {
    return this.currentState;
  }

  /** Replay position; `undefined` outside replay mode. */
  get cursor(): number | undefined {
    return this.session.replayer?.cursor;
  }

  /**
   * In-memory interaction log. Empty in bypass mode.
   */
  interactions(): readonly Interaction[] {
    return this.session.snapshot ? [...this.session.snapshot.calls] : [];
  }

  /**
   * Ends the session. In record mode the snapshot is written, on every call;
   * otherwise nothing is persisted.
   */
  async close(): Promise<void> {
    const firstClose = this.currentState !== SnapshotClientState.Closed;
    this.currentState = SnapshotClientState.Closed;
    const { config, snapshot, replayer, store, snapshotPath, logger, scenario } = this.session;

    if (config.mode === SimulationMode.Record && snapshot) {
      try {
        await store.save(snapshot, snapshotPath);
      } catch (error) {
        if (error instanceof Error) {
          logError(logger, error, `saving snapshot ${snapshotPath}`);
        }
        throw error;
      }
      logger.info('Saved snapshot', { scenario, path: snapshotPath, calls: snapshot.calls.length });
      return;
    }

    if (firstClose && replayer && replayer.remaining > 0) {
      logger.warn('Snapshot closed with unconsumed interactions', {
        scenario,
        path: snapshotPath,
        consumed: replayer.cursor,
        remaining: replayer.remaining,
      });
    }
  }

  async getUser(): Promise<string> {
    return this.active().getUser();
  }

  async findProject(identifier: string): Promise<Project> {
    return this.active().findProject(identifier);
  }

  async getProjectFields(projectId: string): Promise<ProjectField[]> {
    return this.active().getProjectFields(projectId);
  }

  async createDraftIssue(projectId: string, title: string, body: string): Promise<string> {
    return this.active().createDraftIssue(projectId, title, body);
  }

  async createProjectItem(projectId: string, contentId: string): Promise<string> {
    return this.active().createProjectItem(projectId, contentId);
  }

  async getIssueOrPullRequest(url: string): Promise<ContentRecord> {
    return this.active().getIssueOrPullRequest(url);
  }

  async setProjectItemFieldValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValue
  ): Promise<void> {
    return this.active().setProjectItemFieldValue(projectId, itemId, fieldId, value);
  }

  async deleteProjectItem(projectId: string, itemId: string): Promise<void> {
    return this.active().deleteProjectItem(projectId, itemId);
  }

  async createProject(owner: string, title: string, description?: string): Promise<Project> {
    return this.active().createProject(owner, title, description);
  }

  async deleteProject(projectId: string): Promise<void> {
    return this.active().deleteProject(projectId);
  }

  private active(): ProjectsClient {
    if (this.currentState !== SnapshotClientState.Loaded) {
      throw new SimulationError(
        SimulationErrorKind.ClientClosed,
        `Snapshot client for "${this.session.scenario}" is ${this.currentState}`,
        { scenario: this.session.scenario, path: this.session.snapshotPath, cursor: this.cursor }
      );
    }
    return this.session.variant;
  }
}
