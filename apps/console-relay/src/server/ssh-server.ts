import ssh2 from 'ssh2';
import type { Connection, Session } from 'ssh2';
const { Server } = ssh2;
import { readFileSync, existsSync } from 'fs';
import { createHash, timingSafeEqual } from 'crypto';
import {
  DEFAULT_TERMINAL_COLS,
  DEFAULT_TERMINAL_ROWS,
  type ScreenCapture,
} from '@gridrelay/protocol';
import type { OutputPumpMetrics } from '@gridrelay/render';
import type { RelayConfig } from '../config.js';
import * as Sentry from '@sentry/node';
import { RelaySession } from './relay-session.js';

interface SSHServerConfig {
  config: RelayConfig;
  capture: ScreenCapture;
  banner?: string;
}

// Ctrl-C, Ctrl-D, q
const QUIT_KEYS = new Set(['\x03', '\x04', 'q']);

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export class SSHServer {
  private server: InstanceType<typeof Server>;
  private sessions: Map<string, RelaySession> = new Map();
  private config: RelayConfig;
  private capture: ScreenCapture;
  private nextId = 1;

  constructor(options: SSHServerConfig) {
    this.config = options.config;
    this.capture = options.capture;

    if (!existsSync(this.config.hostKeyPath)) {
      throw new Error(
        `Host key not found at ${this.config.hostKeyPath}. ` +
          'Generate one with: ssh-keygen -t ed25519 -f keys/host.key -N ""'
      );
    }

    this.server = new Server(
      {
        hostKeys: [readFileSync(this.config.hostKeyPath)],
        ...(options.banner !== undefined && { banner: options.banner }),
      },
      this.handleConnection.bind(this)
    );
  }

  start(): void {
    this.server.listen(this.config.sshPort, '0.0.0.0', () => {
      console.log(`[ssh] listening on port ${this.config.sshPort}`);
    });
  }

  /**
   * Stop accepting new connections but keep existing sessions alive
   */
  stopAccepting(): void {
    this.server.close();
    console.log('[ssh] stopped accepting new connections');
  }

  stop(): void {
    this.server.close();
    for (const session of this.sessions.values()) {
      session.destroy();
    }
    this.sessions.clear();
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getTransportMetrics(): OutputPumpMetrics[] {
    return Array.from(this.sessions.values(), session => session.getTransportMetrics());
  }

  private checkPassword(candidate: string): boolean {
    const expected = this.config.password;
    if (expected === undefined) return true;
    return timingSafeEqual(digest(candidate), digest(expected));
  }

  private handleConnection(client: Connection, info: { ip: string; port: number }): void {
    const connectionId = `c${this.nextId++}`;
    const owned: string[] = [];

    client.on('authentication', (ctx) => {
      if (this.config.password === undefined) {
        ctx.accept();
      } else if (ctx.method === 'password' && this.checkPassword(ctx.password)) {
        ctx.accept();
      } else {
        ctx.reject(['password']);
      }
    });

    client.on('ready', () => {
      console.log(`[ssh] ${connectionId} authenticated from ${info.ip}`);

      client.on('session', (accept, _reject) => {
        const sessionId = `${connectionId}.${owned.length + 1}`;
        owned.push(sessionId);
        this.handleSession(accept(), sessionId);
      });
    });

    client.on('error', (err) => {
      console.error(`[ssh] ${connectionId} client error:`, err.message);
    });

    client.on('close', () => {
      for (const sessionId of owned) {
        this.closeSession(sessionId);
      }
    });
  }

  private handleSession(session: Session, sessionId: string): void {
    let ptyInfo: { cols: number; rows: number } | null = null;

    session.on('pty', (accept, _reject, info) => {
      ptyInfo = { cols: info.cols, rows: info.rows };
      accept?.();
    });

    session.on('shell', (accept, _reject) => {
      const size = ptyInfo ?? { cols: DEFAULT_TERMINAL_COLS, rows: DEFAULT_TERMINAL_ROWS };
      const stream = accept();

      const relay = new RelaySession({
        id: sessionId,
        stream,
        cols: size.cols || DEFAULT_TERMINAL_COLS,
        rows: size.rows || DEFAULT_TERMINAL_ROWS,
        capture: this.capture,
        frameIntervalMs: this.config.frameIntervalMs,
        bypassMode: this.config.bypassMode,
        maxQueuedBytes: this.config.maxQueuedBytes,
      });
      this.sessions.set(sessionId, relay);

      stream.on('data', (data: Buffer) => {
        if (QUIT_KEYS.has(data.toString('utf8'))) {
          this.closeSession(sessionId);
          stream.exit(0);
          stream.end();
        }
      });
      stream.on('close', () => this.closeSession(sessionId));

      try {
        relay.start();
      } catch (error) {
        console.error(`[session] ${sessionId} failed to start:`, error);
        Sentry.captureException(error);
        this.closeSession(sessionId);
        stream.end();
      }
    });

    session.on('window-change', (accept, _reject, info) => {
      this.sessions.get(sessionId)?.resize(info.cols, info.rows);
      accept?.();
    });
  }

  private closeSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.destroy();
      this.sessions.delete(sessionId);
    }
  }
}
