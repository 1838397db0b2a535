/**
 * SSH sessions to the routers.
 *
 * One ssh2 connection per router, opened on first use and reused for every
 * command after that. A session that errors or closes is dropped and the next
 * command reconnects. The private key is read once per pool.
 */

import { Client } from 'ssh2';
import { readFileSync } from 'fs';
import type { Config } from '../config.js';
import { log } from '../logger.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

export type SshSettings = Pick<Config, 'sshUser' | 'sshKeyPath'>;

export interface ConnectOptions {
  username: string;
  privateKey: Buffer;
}

/** An authenticated connection that can run commands */
export interface SshSession {
  exec(command: string, timeoutMs: number): Promise<ExecResult>;
  end(): void;
  /** Called once when the connection goes away on its own */
  onClose(listener: (reason: string) => void): void;
}

export type SessionFactory = (host: string, options: ConnectOptions) => Promise<SshSession>;

/** Runs commands on a host; what the vtysh sink needs from SSH */
export interface CommandExecutor {
  exec(host: string, command: string): Promise<ExecResult>;
  close(): Promise<void>;
}

const CONNECT_TIMEOUT_MS = 20_000;
const COMMAND_TIMEOUT_MS = 30_000;

function runOn(conn: Client, host: string, command: string, timeoutMs: number): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`SSH to ${host} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    conn.exec(command, (err, stream) => {
      if (err) {
        clearTimeout(timer);
        return reject(new Error(`SSH to ${host}: ${err.message}`));
      }

      let stdout = '';
      let stderr = '';

      stream.on('data', (data: Buffer) => { stdout += data.toString(); });
      stream.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      stream.on('close', (code: number) => {
        clearTimeout(timer);
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code });
      });
    });
  });
}

/** Open an ssh2 connection and resolve once it is ready */
export function openSession(host: string, options: ConnectOptions): Promise<SshSession> {
  return new Promise((resolve, reject) => {
    const conn = new Client();
    let ready = false;
    let closed = false;
    const closeListeners: Array<(reason: string) => void> = [];

    const notifyClosed = (reason: string): void => {
      if (closed) return;
      closed = true;
      for (const listener of closeListeners) listener(reason);
    };

    conn
      .on('ready', () => {
        ready = true;
        resolve({
          exec: (command, timeoutMs) => runOn(conn, host, command, timeoutMs),
          end: () => conn.end(),
          onClose: listener => { closeListeners.push(listener); },
        });
      })
      .on('error', (err) => {
        if (ready) {
          notifyClosed(err.message);
        } else {
          reject(new Error(`SSH to ${host}: ${err.message}`));
        }
      })
      .on('close', () => notifyClosed('connection closed'))
      .connect({
        host,
        port: 22,
        username: options.username,
        privateKey: options.privateKey,
        readyTimeout: CONNECT_TIMEOUT_MS,
      });
  });
}

export class SshPool implements CommandExecutor {
  private sessions = new Map<string, Promise<SshSession>>();
  private privateKey: Buffer | null = null;

  constructor(
    private readonly config: SshSettings,
    private readonly connect: SessionFactory = openSession,
    private readonly readKey: (path: string) => Buffer = path => readFileSync(path),
    private readonly timeoutMs = COMMAND_TIMEOUT_MS,
  ) {}

  /** Hosts with an open or opening session */
  get hosts(): string[] {
    return [...this.sessions.keys()];
  }

  async exec(host: string, command: string): Promise<ExecResult> {
    const pending = this.session(host);
    const session = await pending;
    try {
      return await session.exec(command, this.timeoutMs);
    } catch (err) {
      this.drop(host, pending, session);
      throw err;
    }
  }

  /** End every session; later commands open new ones */
  async close(): Promise<void> {
    const pending = [...this.sessions.values()];
    this.sessions.clear();
    const settled = await Promise.allSettled(pending);
    for (const result of settled) {
      if (result.status === 'fulfilled') result.value.end();
    }
  }

  private session(host: string): Promise<SshSession> {
    const existing = this.sessions.get(host);
    if (existing) return existing;

    const pending: Promise<SshSession> = Promise.resolve()
      .then(() => this.connect(host, { username: this.config.sshUser, privateKey: this.key() }))
      .then(
        session => {
          session.onClose(reason => {
            if (this.sessions.get(host) !== pending) return;
            this.sessions.delete(host);
            log(`[SSH] Session to ${host} closed (${reason}), reconnecting on next command`);
          });
          return session;
        },
        (err: unknown) => {
          if (this.sessions.get(host) === pending) this.sessions.delete(host);
          throw err;
        },
      );
    this.sessions.set(host, pending);
    return pending;
  }

  private drop(host: string, pending: Promise<SshSession>, session: SshSession): void {
    if (this.sessions.get(host) === pending) this.sessions.delete(host);
    session.end();
  }

  private key(): Buffer {
    if (!this.privateKey) {
      this.privateKey = this.readKey(this.config.sshKeyPath);
    }
    return this.privateKey;
  }
}
