/**
 * Credential Gate
 * Validates both API keys and probes the primary API before unlocking chat
 */

import type { IChatSession } from '../../domain/conversation/session.js';
import type { CredentialError, Outcome } from '../../domain/conversation/errors.js';
import {
  CredentialRejectedError,
  MalformedCredentialError,
  MissingCredentialError,
  fail,
  succeed,
} from '../../domain/conversation/errors.js';
import type { LLMProviderFactory } from '../../infra/llm/llm-provider.js';
import { describeError } from '../../infra/llm/llm-provider.js';
import { debug } from '../../debug/index.js';

export interface CredentialGateOptions {
  primaryKeyPrefix: string;
  secondaryKeyPrefix: string;
  probePrompt: string;
  probeTimeoutMs: number;
  probeMaxTokens: number;
  primaryKeyLabel?: string;
  secondaryKeyLabel?: string;
}

export class CredentialGate {
  constructor(
    private createPrimaryProvider: LLMProviderFactory,
    private options: CredentialGateOptions
  ) {}

  /**
   * Check both keys and make one probe call with the primary key.
   * Nothing is written to the session unless the probe succeeds.
   */
  async submit(
    session: IChatSession,
    primaryKey: string,
    secondaryKey: string
  ): Promise<Outcome<void, CredentialError>> {
    debug.credentialsSubmitted(session.id);

    const validation = this.validate(primaryKey, secondaryKey);
    if (validation) {
      debug.credentialsRejected(session.id, validation.code, validation.message);
      return fail(validation);
    }

    const primary = primaryKey.trim();
    const secondary = secondaryKey.trim();

    try {
      const provider = this.createPrimaryProvider(primary);
      await provider.complete(
        [{ role: 'user', content: this.options.probePrompt }],
        { safety: 'relaxed', timeout: this.options.probeTimeoutMs, maxTokens: this.options.probeMaxTokens }
      );
    } catch (error) {
      const rejected = new CredentialRejectedError(describeError(error));
      debug.credentialsRejected(session.id, rejected.code, rejected.remoteMessage);
      return fail(rejected);
    }

    session.primaryApiKey = primary;
    session.secondaryApiKey = secondary;
    session.credentialsProvided = true;
    session.updatedAt = Date.now();

    debug.credentialsAccepted(session.id);
    return succeed(undefined);
  }

  /**
   * Local checks only: presence, then the primary prefix, then the secondary prefix.
   */
  validate(primaryKey: string, secondaryKey: string): MissingCredentialError | MalformedCredentialError | null {
    const primary = primaryKey.trim();
    const secondary = secondaryKey.trim();

    if (!primary || !secondary) {
      return new MissingCredentialError();
    }

    const { primaryKeyPrefix, secondaryKeyPrefix } = this.options;
    if (!primary.startsWith(primaryKeyPrefix)) {
      return new MalformedCredentialError(
        'primary',
        primaryKeyPrefix,
        this.options.primaryKeyLabel ?? 'Primary API key'
      );
    }
    if (!secondary.startsWith(secondaryKeyPrefix)) {
      return new MalformedCredentialError(
        'secondary',
        secondaryKeyPrefix,
        this.options.secondaryKeyLabel ?? 'Secondary API key'
      );
    }

    return null;
  }
}
