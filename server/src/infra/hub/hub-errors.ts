/**
 * Hub invariant violations.
 * No-op conditions (publish without subscribers, repeated unsubscribe) are not errors.
 */

export type HubErrorCode = 'UNKNOWN_CONNECTION' | 'HUB_CLOSED';

export class HubError extends Error {
  constructor(
    message: string,
    public readonly code: HubErrorCode
  ) {
    super(message);
    this.name = 'HubError';
  }
}
