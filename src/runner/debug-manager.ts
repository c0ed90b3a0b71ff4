import { type Config, defaultConfig } from '../parser/config-schema.ts';
import type { ExecutionContext, Workflow } from '../parser/schema.ts';
import { SessionNotFoundError } from '../utils/errors.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { ReadWriteLock } from '../utils/rw-lock.ts';
import { EventBus, type EventHandler, timestamp } from './events.ts';
import type { ExecutorServices } from './executors/types.ts';
import { type DebugCommand, type DebugEvent, DebugSession } from './debug-session.ts';

export interface DebugManagerOptions {
  config?: Config;
  logger?: Logger;
  services?: Partial<ExecutorServices>;
}

export interface CreateSessionOptions {
  breakpoints?: number[];
  /** Start the command loop right away */
  start?: boolean;
}

/**
 * Registry of debug sessions. Only the registry map is locked; each session
 * owns its own context and loop.
 */
export class DebugManager {
  private readonly sessions = new Map<string, DebugSession>();
  private readonly lock = new ReadWriteLock();
  private readonly events: EventBus<DebugEvent>;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly services?: Partial<ExecutorServices>;
  private activeId?: string;

  constructor(options: DebugManagerOptions = {}) {
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new ConsoleLogger();
    this.services = options.services;
    this.events = new EventBus<DebugEvent>(this.logger);
  }

  /**
   * Events of every session, plus registry errors
   */
  subscribe(handler: EventHandler<DebugEvent>): () => void {
    return this.events.subscribe(handler);
  }

  async createSession(
    workflow: Workflow,
    inputs: ExecutionContext = {},
    options: CreateSessionOptions = {}
  ): Promise<DebugSession> {
    const session = new DebugSession(workflow, inputs, {
      config: this.config,
      logger: this.logger,
      services: this.services,
      breakpoints: options.breakpoints,
      onEvent: (event) => this.events.emit(event),
    });

    await this.lock.withWrite(() => {
      this.sessions.set(session.id, session);
      this.activeId = session.id;
    });

    if (options.start) {
      session.start();
    }
    return session;
  }

  /**
   * @throws SessionNotFoundError
   */
  async getSession(id: string): Promise<DebugSession> {
    const session = await this.lock.withRead(() => this.sessions.get(id));
    if (!session) {
      throw this.notFound(id);
    }
    return session;
  }

  async findSession(id: string): Promise<DebugSession | undefined> {
    return this.lock.withRead(() => this.sessions.get(id));
  }

  async listSessions(): Promise<DebugSession[]> {
    return this.lock.withRead(() => [...this.sessions.values()]);
  }

  async activeSession(): Promise<DebugSession | undefined> {
    return this.lock.withRead(() => (this.activeId ? this.sessions.get(this.activeId) : undefined));
  }

  /**
   * Drop a session and stop its loop
   *
   * @throws SessionNotFoundError
   */
  async removeSession(id: string): Promise<void> {
    const session = await this.lock.withWrite(() => {
      const found = this.sessions.get(id);
      this.sessions.delete(id);
      if (this.activeId === id) this.activeId = undefined;
      return found;
    });
    if (!session) {
      throw this.notFound(id);
    }
    await session.dispose();
  }

  /**
   * @throws SessionNotFoundError
   */
  async sendCommand(id: string, command: DebugCommand): Promise<void> {
    const session = await this.getSession(id);
    session.send(command);
  }

  async summary(id: string): Promise<string> {
    const session = await this.getSession(id);
    return session.summary();
  }

  async dispose(): Promise<void> {
    const sessions = await this.lock.withWrite(() => {
      const all = [...this.sessions.values()];
      this.sessions.clear();
      this.activeId = undefined;
      return all;
    });
    await Promise.all(sessions.map((session) => session.dispose()));
  }

  private notFound(id: string): SessionNotFoundError {
    const error = new SessionNotFoundError(id);
    this.logger.error(`✗ ${error.message}`);
    this.events.emit({ type: 'debug.error', timestamp: timestamp(), runId: id, workflow: '', error: error.message });
    return error;
  }
}
