/** Recipient used on envelopes addressed to every registered agent. */
export const BROADCAST_ADDRESS = '*';

export const BROADCAST_CHANNEL = 'broadcast';

const INBOX_PREFIX = 'inbox:';

export function inboxChannel(agentId: string): string {
  return `${INBOX_PREFIX}${agentId}`;
}
