export type EventHandler = (payload: unknown) => void;

/** In-process publish/subscribe bus shared by all pipeline components */
export interface IEventBus {
  emit(event: string, payload: unknown): void;
  /** Returns an unsubscribe function */
  on(event: string, handler: EventHandler): () => void;
  once(event: string, handler: EventHandler): () => void;
  removeAllListeners(event?: string): void;
}
