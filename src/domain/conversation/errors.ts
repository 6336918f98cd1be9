/**
 * Chat Session Error Taxonomy
 *
 * Every failure resolves to one of these and a well-defined session state:
 * - credential-stage errors keep the session locked
 * - AuthError demotes a chatting session back to locked, history intact
 * - TransientRemoteError leaves the session chat-capable
 * - SummaryError replaces the summary view with a failure message
 */

export type ChatRelayErrorCode =
  | 'MissingCredential'
  | 'MalformedCredential'
  | 'CredentialRejected'
  | 'AuthError'
  | 'TransientRemoteError'
  | 'SummaryError'
  | 'SessionPrecondition';

export type CredentialKey = 'primary' | 'secondary';

export type PreconditionReason = 'locked' | 'ended' | 'not-ended' | 'empty-message' | 'busy';

export abstract class ChatRelayError extends Error {
  abstract readonly code: ChatRelayErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends ChatRelayError {
  readonly code = 'MissingCredential' as const;

  constructor() {
    super('Please provide both API keys');
  }
}

export class MalformedCredentialError extends ChatRelayError {
  readonly code = 'MalformedCredential' as const;

  constructor(
    public readonly key: CredentialKey,
    public readonly expectedPrefix: string,
    label: string
  ) {
    super(`${label} should start with '${expectedPrefix}'`);
  }
}

export class CredentialRejectedError extends ChatRelayError {
  readonly code = 'CredentialRejected' as const;

  constructor(public readonly remoteMessage: string) {
    super(`API key verification failed: ${remoteMessage}`);
  }
}

export class AuthError extends ChatRelayError {
  readonly code = 'AuthError' as const;

  constructor(public readonly remoteMessage: string) {
    super('Invalid API key. Please check your key and try again.');
  }
}

export class TransientRemoteError extends ChatRelayError {
  readonly code = 'TransientRemoteError' as const;

  constructor(public readonly remoteMessage: string) {
    super(`Error getting response: ${remoteMessage}`);
  }
}

export class SummaryError extends ChatRelayError {
  readonly code = 'SummaryError' as const;

  constructor(public readonly remoteMessage: string) {
    super(`Error generating summary: ${remoteMessage}`);
  }
}

const PRECONDITION_MESSAGES: Record<PreconditionReason, string> = {
  locked: 'Enter valid API keys before chatting',
  ended: 'The conversation has ended; start a new one to keep chatting',
  'not-ended': 'The conversation is still open',
  'empty-message': 'Message is empty',
  busy: 'Another request is still in progress',
};

export class SessionPreconditionError extends ChatRelayError {
  readonly code = 'SessionPrecondition' as const;

  constructor(public readonly reason: PreconditionReason) {
    super(PRECONDITION_MESSAGES[reason]);
  }
}

export type CredentialError =
  | MissingCredentialError
  | MalformedCredentialError
  | CredentialRejectedError
  | SessionPreconditionError;

export type ChatError = AuthError | TransientRemoteError | SessionPreconditionError;

export type SummarizeError = SummaryError | SessionPreconditionError;

export type Outcome<T, E extends ChatRelayError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function succeed<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends ChatRelayError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
