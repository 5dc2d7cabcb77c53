/**
 * Ambient context merged into every outgoing event until cleared.
 */

import type { EventContext } from '../types/events';

export class ContextStore {
  private context: Readonly<EventContext> = {};

  /** Shallow-merge; keys already present are overwritten. */
  set(partial: EventContext): void {
    this.context = Object.freeze({ ...this.context, ...partial });
  }

  clear(): void {
    this.context = {};
  }

  current(): EventContext {
    return { ...this.context };
  }
}
