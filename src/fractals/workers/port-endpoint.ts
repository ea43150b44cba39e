import type { Endpoint } from "comlink";

/**
 * The part of a Node.js message channel Comlink needs: `Worker` on the main
 * thread and `parentPort` inside a worker both fit.
 */
export interface MessageTarget {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
}

/**
 * Presents a Node.js message target as a DOM-style Comlink endpoint.
 * Node delivers the payload itself; Comlink expects it wrapped in a `MessageEvent`.
 */
export function portEndpoint(target: MessageTarget): Endpoint {
  const handlers = new Map<EventListenerOrEventListenerObject, (value: unknown) => void>();

  return {
    postMessage: (message: unknown) => target.postMessage(message),

    addEventListener: (_type: string, listener: EventListenerOrEventListenerObject) => {
      const handler = (data: unknown) => {
        const event = new MessageEvent("message", { data });
        if (typeof listener === "function") {
          listener(event);
        } else {
          listener.handleEvent(event);
        }
      };
      handlers.set(listener, handler);
      target.on("message", handler);
    },

    removeEventListener: (_type: string, listener: EventListenerOrEventListenerObject) => {
      const handler = handlers.get(listener);
      if (handler) {
        target.off("message", handler);
        handlers.delete(listener);
      }
    },
  };
}
