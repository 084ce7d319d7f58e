export type ConnectivityListener = (online: boolean) => void;

export interface Connectivity {
  isOnline(): boolean;
  /** Returns an unsubscribe function. */
  onChange(listener: ConnectivityListener): () => void;
}

/**
 * Connectivity flag set by whoever knows the network state (the host
 * application, the CLI, a test).
 */
export class ConnectivitySignal implements Connectivity {
  private readonly listeners = new Set<ConnectivityListener>();

  constructor(private online = true) {}

  isOnline(): boolean {
    return this.online;
  }

  set(online: boolean): void {
    if (online === this.online) return;
    this.online = online;
    for (const listener of [...this.listeners]) {
      try {
        listener(online);
      } catch (error) {
        console.error('[Connectivity] Listener failed:', error);
      }
    }
  }

  onChange(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
