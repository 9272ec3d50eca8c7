// ============================================================================
// src/presentation/events/types.ts
// ============================================================================

import type { Client, ClientEvents } from 'discord.js';

export interface EventDescriptor<K extends keyof ClientEvents> {
  readonly name: K;
  readonly once: boolean;
  readonly execute: (...args: ClientEvents[K]) => Promise<void>;
}

export const bindEvent = <K extends keyof ClientEvents>(
  client: Client,
  descriptor: EventDescriptor<K>,
  onError: (error: unknown, name: K) => void,
): void => {
  const listener = (...args: ClientEvents[K]): void => {
    descriptor.execute(...args).catch((error: unknown) => onError(error, descriptor.name));
  };

  if (descriptor.once) {
    client.once(descriptor.name, listener);
  } else {
    client.on(descriptor.name, listener);
  }
};
