/**
 * Debug event emitter.
 * Delivers instrumentation events to subscribers and scrubs API keys from
 * every payload before it leaves the process-wide emitter.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugContext, DebugEvent, DebugEventType } from './types.js';

export const REDACTED = '[redacted]';

const DEFAULT_KEY_PREFIXES = ['AIza', 'sk-'];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches any token that starts with one of the prefixes, e.g. "AIzaSy..." or "sk-proj-...".
 */
function buildKeyPattern(prefixes: readonly string[]): RegExp | null {
  const usable = prefixes.filter(prefix => prefix.length > 0);
  if (usable.length === 0) {
    return null;
  }
  const alternatives = usable.map(escapeRegExp).join('|');
  return new RegExp(`(?<![A-Za-z0-9_-])(?:${alternatives})[A-Za-z0-9_-]*`, 'g');
}

export class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};
  private keyPattern: RegExp | null = buildKeyPattern(DEFAULT_KEY_PREFIXES);

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  isEnabled(): boolean {
    return this._enabled;
  }

  /**
   * Replace the key prefixes that mark a string as a secret.
   * The CLI passes the configured credential prefixes here.
   */
  setKeyPrefixes(prefixes: readonly string[]): void {
    this.keyPattern = buildKeyPattern(prefixes);
  }

  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * @returns false when debug is disabled and nothing was emitted
   */
  emitDebug(type: DebugEventType, source: string, data: Record<string, unknown>): boolean {
    if (!this._enabled) {
      return false;
    }

    const event: DebugEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      type,
      source,
      data: this.redactRecord(data),
      ...(this.context.sessionId ? { sessionId: this.context.sessionId } : {}),
    };

    return super.emit('debug', event);
  }

  onDebug(handler: (event: DebugEvent) => void): void {
    this.on('debug', handler);
  }

  offDebug(handler: (event: DebugEvent) => void): void {
    this.off('debug', handler);
  }

  private redactRecord(data: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [key, this.redactValue(value)])
    );
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.keyPattern ? value.replace(this.keyPattern, REDACTED) : value;
    }
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([key, nested]) => [key, this.redactValue(nested)])
      );
    }
    return value;
  }
}

export const debugEmitter = new DebugEmitter();
