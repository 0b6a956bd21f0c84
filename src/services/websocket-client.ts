/**
 * WebSocket client for the realtime market data feed
 * Authenticates, subscribes instruments and reconnects automatically
 */

import WebSocket from 'ws';
import { EventEmitter } from 'events';
import { RealtimeResultMessage } from '../types';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child('feed');

export interface RealtimeWebSocketClientOptions {
  url: string;
  apiKey: string;
  exchange?: string;
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
  heartbeatInterval?: number;
  heartbeatTimeout?: number;
  connectTimeout?: number;
  authRetryDelay?: number;
}

export declare interface RealtimeWebSocketClient {
  on(event: 'realtimeResult', listener: (message: RealtimeResultMessage) => void): this;
  on(event: 'authenticated', listener: () => void): this;
  on(event: 'authenticationFailed', listener: (reason: string) => void): this;
  on(event: 'subscribed', listener: (symbols: string[]) => void): this;
  on(event: 'disconnected', listener: (payload: { code: number; reason: string }) => void): this;
  on(event: 'maxReconnectAttemptsReached', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * WebSocket client with authentication handshake and auto-reconnection
 */
export class RealtimeWebSocketClient extends EventEmitter {
  private ws: WebSocket | null = null;
  private options: Required<RealtimeWebSocketClientOptions>;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private isConnecting = false;
  private authenticated = false;
  private shouldReconnect = true;
  private nextReconnectDelay: number | null = null;
  private subscriptions: string[] = [];
  private abortPendingConnect: ((error: Error) => void) | null = null;
  private lastActivity = Date.now();

  constructor(options: RealtimeWebSocketClientOptions) {
    super();

    const heartbeatInterval = options.heartbeatInterval ?? 20000;

    this.options = {
      url: options.url,
      apiKey: options.apiKey,
      exchange: options.exchange ?? 'NFO',
      reconnectInterval: options.reconnectInterval ?? 5000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? Number.POSITIVE_INFINITY,
      heartbeatInterval,
      heartbeatTimeout: options.heartbeatTimeout ?? heartbeatInterval * 3,
      connectTimeout: options.connectTimeout ?? 10000,
      authRetryDelay: options.authRetryDelay ?? 30000,
    };
  }

  /**
   * Connect and authenticate; resolves once the feed accepted the API key
   */
  async connect(): Promise<void> {
    if (this.isConnecting || this.isConnected()) {
      return;
    }

    this.isConnecting = true;
    this.shouldReconnect = true;
    this.authenticated = false;

    logger.info(`Connecting to market data feed: ${this.options.url}`);

    const socket = new WebSocket(this.options.url);
    this.ws = socket;
    this.lastActivity = Date.now();

    // Events from a socket that has since been replaced or disconnected are ignored
    socket.on('open', () => {
      if (this.ws === socket) this.onOpen();
    });
    socket.on('message', (data: WebSocket.RawData) => {
      if (this.ws === socket) this.onMessage(data);
    });
    socket.on('close', (code: number, reason: Buffer) => {
      if (this.ws === socket) {
        this.onClose(code, reason);
      } else {
        logger.debug(`Retired WebSocket closed: ${code}`);
      }
    });
    socket.on('error', (error: Error) => {
      if (this.ws === socket) {
        this.onError(error);
      } else {
        logger.debug('Error from retired WebSocket', error);
      }
    });
    socket.on('pong', () => {
      if (this.ws === socket) this.onPong();
    });

    try {
      await new Promise<void>((resolve, reject) => {
        let timeout: NodeJS.Timeout | null = null;

        const cleanup = (): void => {
          if (timeout) {
            clearTimeout(timeout);
            timeout = null;
          }
          if (this.abortPendingConnect === abort) {
            this.abortPendingConnect = null;
          }
          this.off('authenticated', handleAuthenticated);
          this.off('authenticationFailed', handleAuthFailed);
          this.off('error', handleError);
        };

        const abort = (error: Error): void => {
          cleanup();
          reject(error);
        };

        const handleAuthenticated = (): void => {
          cleanup();
          resolve();
        };

        const handleAuthFailed = (reason: string): void => {
          cleanup();
          reject(new Error(`Authentication failed: ${reason}`));
        };

        const handleError = (error: Error): void => {
          cleanup();
          reject(error);
        };

        timeout = setTimeout(() => {
          cleanup();
          // Closing the stalled socket hands control to the reconnect loop
          socket.terminate();
          reject(new Error('Connection timeout'));
        }, this.options.connectTimeout);

        this.abortPendingConnect = abort;
        this.once('authenticated', handleAuthenticated);
        this.once('authenticationFailed', handleAuthFailed);
        this.once('error', handleError);
      });
    } finally {
      if (this.ws === socket) {
        this.isConnecting = false;
      }
    }
  }

  /**
   * Disconnect from WebSocket
   */
  disconnect(): void {
    this.shouldReconnect = false;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    this.stopHeartbeat();

    const pending = this.abortPendingConnect;
    if (pending) {
      pending(new Error('Connection aborted by disconnect'));
    }

    const socket = this.ws;
    this.ws = null;
    if (socket) {
      socket.close();
    }

    this.isConnecting = false;
    this.authenticated = false;
    this.reconnectAttempts = 0;
    this.nextReconnectDelay = null;
  }

  /**
   * Subscribe realtime quotes for each symbol
   */
  subscribeSymbols(symbols: string[]): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN || !this.authenticated) {
      throw new Error('WebSocket is not connected');
    }

    for (const symbol of symbols) {
      this.sendSubscription(this.ws, symbol);
      if (!this.subscriptions.includes(symbol)) {
        this.subscriptions.push(symbol);
      }
    }

    logger.info(`Subscriptions sent for ${symbols.length} symbols`);
    this.emit('subscribed', [...symbols]);
  }

  /**
   * Handle WebSocket open event: start the authentication handshake
   */
  private onOpen(): void {
    logger.info('WebSocket connected. Authenticating...');
    this.lastActivity = Date.now();
    this.startHeartbeat();

    try {
      this.send({ MessageType: 'Authenticate', Password: this.options.apiKey });
    } catch (error) {
      logger.error('Failed to send authentication request', error);
    }
  }

  /**
   * Handle WebSocket message event
   */
  private onMessage(data: WebSocket.RawData): void {
    this.lastActivity = Date.now();

    let message: unknown;
    try {
      message = JSON.parse(data.toString());
    } catch {
      logger.warn('Received a non-JSON message');
      return;
    }

    if (!isRecord(message)) {
      return;
    }

    switch (message['MessageType']) {
      case 'AuthenticateResult':
        this.handleAuthenticateResult(message);
        break;
      case 'RealtimeResult':
        this.emit('realtimeResult', this.toRealtimeResult(message));
        break;
      default:
        break;
    }
  }

  private handleAuthenticateResult(message: JsonRecord): void {
    if (message['Complete'] === true) {
      logger.info('Authentication successful');
      this.authenticated = true;
      this.reconnectAttempts = 0;
      this.nextReconnectDelay = null;

      if (this.subscriptions.length > 0) {
        this.resubscribe();
      }

      this.emit('authenticated');
      return;
    }

    const reason = String(message['Comment'] ?? message['Reason'] ?? 'unknown reason');
    logger.error(`Authentication FAILED: ${reason}. Retrying in ${this.options.authRetryDelay}ms`);
    this.authenticated = false;
    this.nextReconnectDelay = this.options.authRetryDelay;
    this.emit('authenticationFailed', reason);
    this.ws?.close();
  }

  /**
   * Handle WebSocket close event
   */
  private onClose(code: number, reason: Buffer): void {
    logger.warn(`WebSocket closed: ${code} - ${reason.toString()}`);

    this.isConnecting = false;
    this.authenticated = false;
    this.lastActivity = Date.now();
    this.stopHeartbeat();

    this.emit('disconnected', { code, reason: reason.toString() });

    if (this.shouldReconnect) {
      this.scheduleReconnect();
    }
  }

  /**
   * Handle WebSocket error event
   */
  private onError(error: Error): void {
    logger.error('WebSocket error', error);
    this.isConnecting = false;
    this.emit('error', error);
  }

  private onPong(): void {
    this.lastActivity = Date.now();
  }

  /**
   * Schedule reconnection attempt
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }

    const maxAttempts = this.options.maxReconnectAttempts;
    const hasLimit = Number.isFinite(maxAttempts);

    this.reconnectAttempts++;

    if (hasLimit && this.reconnectAttempts > maxAttempts) {
      logger.error('Max reconnection attempts reached');
      this.shouldReconnect = false;
      this.emit('maxReconnectAttemptsReached');
      return;
    }

    const delay =
      this.nextReconnectDelay ??
      Math.min(this.options.reconnectInterval * Math.pow(2, this.reconnectAttempts - 1), 30000);
    this.nextReconnectDelay = null;

    logger.info(`Scheduling reconnection attempt ${this.reconnectAttempts} in ${delay}ms`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;

      this.connect().catch((error) => {
        if (!this.shouldReconnect) {
          logger.debug('Reconnection attempt abandoned after disconnect');
          return;
        }
        // The close handler schedules the next attempt
        logger.error('Reconnection failed', error);
      });
    }, delay);
  }

  /**
   * Ping frames keep the connection alive; idle sockets are terminated
   */
  private startHeartbeat(): void {
    this.stopHeartbeat();

    this.heartbeatTimer = setInterval(() => {
      const socket = this.ws;

      if (!socket || socket.readyState !== WebSocket.OPEN) {
        return;
      }

      try {
        socket.ping();
      } catch (error) {
        logger.warn('Failed to send ping frame', error);
      }

      const idleTime = Date.now() - this.lastActivity;
      if (idleTime > this.options.heartbeatTimeout) {
        logger.warn(`Heartbeat timeout exceeded (${idleTime}ms), terminating WebSocket`);
        socket.terminate();
      }
    }, this.options.heartbeatInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /**
   * Re-subscribe to all symbols after reconnection
   */
  private resubscribe(): void {
    const socket = this.ws;
    if (!socket) {
      return;
    }

    for (const symbol of this.subscriptions) {
      try {
        this.sendSubscription(socket, symbol);
      } catch (error) {
        logger.error(`Failed to resubscribe to ${symbol}`, error);
      }
    }
    logger.info(`Resubscribed ${this.subscriptions.length} symbols`);
  }

  private sendSubscription(socket: WebSocket, symbol: string): void {
    socket.send(
      JSON.stringify({
        MessageType: 'SubscribeRealtime',
        Exchange: this.options.exchange,
        Unsubscribe: 'false',
        InstrumentIdentifier: symbol,
      })
    );
  }

  private send(payload: JsonRecord): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error('WebSocket is not connected');
    }
    this.ws.send(JSON.stringify(payload));
  }

  /**
   * Keep only the fields the scanner consumes, with their expected types
   */
  private toRealtimeResult(message: JsonRecord): RealtimeResultMessage {
    const result: RealtimeResultMessage = { MessageType: 'RealtimeResult' };

    const exchange = message['Exchange'];
    if (typeof exchange === 'string') {
      result.Exchange = exchange;
    }

    const symbol = message['InstrumentIdentifier'];
    if (typeof symbol === 'string') {
      result.InstrumentIdentifier = symbol;
    }

    const price = message['LastTradePrice'];
    if (typeof price === 'number') {
      result.LastTradePrice = price;
    }

    const openInterest = message['OpenInterest'];
    if (typeof openInterest === 'number') {
      result.OpenInterest = openInterest;
    }

    const lastTradeTime = message['LastTradeTime'];
    if (typeof lastTradeTime === 'number') {
      result.LastTradeTime = lastTradeTime;
    }

    return result;
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN && this.authenticated;
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  getSubscriptions(): string[] {
    return [...this.subscriptions];
  }
}
