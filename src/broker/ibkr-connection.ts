import { IBApi, EventName, ErrorCode, isNonFatalError } from "@stoqey/ib";
import { logBroker } from "../logging.js";

const RECONNECT_STEPS_MS = [2_000, 4_000, 8_000, 16_000, 30_000] as const;
const CONNECT_TIMEOUT_MS = 10_000;

export interface IbkrConnectionOptions {
  host: string;
  port: number;
  clientId: number;
}

/**
 * Owns the single IBApi socket: lazy creation, connect with timeout,
 * stepped reconnect after drops, and request-id allocation.
 */
export class IbkrConnection {
  private ib: IBApi | null = null;
  private connected = false;
  private nextReqId = 1;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempts = 0;
  private stopped = false;

  constructor(private readonly opts: IbkrConnectionOptions) {}

  /** Get the IBApi instance, initializing it if necessary. */
  getIB(): IBApi {
    if (this.ib) return this.ib;
    const ib = new IBApi({ host: this.opts.host, port: this.opts.port, clientId: this.opts.clientId });

    ib.on(EventName.connected, () => {
      this.connected = true;
      this.reconnectAttempts = 0;
      if (this.reconnectTimer) {
        clearTimeout(this.reconnectTimer);
        this.reconnectTimer = null;
      }
      logBroker.info({ clientId: this.opts.clientId, port: this.opts.port }, "Connected to TWS/Gateway");
    });

    ib.on(EventName.disconnected, () => {
      this.connected = false;
      logBroker.warn("Disconnected from TWS/Gateway");
      this.scheduleReconnect();
    });

    ib.on(EventName.error, (err: Error, code: ErrorCode, reqId: number) => {
      if (isNonFatalError(code, err)) return;
      logBroker.error({ code, reqId, err }, "IBKR error");
    });

    this.ib = ib;
    return ib;
  }

  getNextReqId(): number {
    return this.nextReqId++;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.stopped = false;
    const api = this.getIB();
    if (this.connected) return;
    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(new Error(`Connection timed out after ${CONNECT_TIMEOUT_MS / 1000} seconds`));
      }, CONNECT_TIMEOUT_MS);

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };
      const onError = (err: Error, code: ErrorCode) => {
        if (isNonFatalError(code, err)) return;
        if (settled) return;
        settled = true;
        cleanup();
        reject(new Error(`Connection failed (code ${code}): ${err.message}`));
      };
      const cleanup = () => {
        clearTimeout(timeout);
        api.off(EventName.connected, onConnect);
        api.off(EventName.error, onError);
      };
      api.on(EventName.connected, onConnect);
      api.on(EventName.error, onError);
      api.connect();
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.stopped) return;
    const step = RECONNECT_STEPS_MS[Math.min(this.reconnectAttempts, RECONNECT_STEPS_MS.length - 1)];
    this.reconnectAttempts++;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      logBroker.info({ attempt: this.reconnectAttempts }, "Attempting reconnect");
      this.connect().catch((e: unknown) => {
        logBroker.warn({ err: e }, "Reconnect failed");
        this.scheduleReconnect();
      });
    }, step);
  }

  disconnect(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ib) {
      this.ib.disconnect();
      this.connected = false;
    }
  }
}
