import { log } from '../utils/logger';

export enum ServiceState {
  CONFIGURING = 'configuring',
  LOADING_APP = 'loading_app',
  LISTENING = 'listening',
  DRAINING = 'draining',
  STOPPED = 'stopped'
}

const TRANSITIONS: Record<ServiceState, readonly ServiceState[]> = {
  [ServiceState.CONFIGURING]: [ServiceState.LOADING_APP, ServiceState.STOPPED],
  [ServiceState.LOADING_APP]: [ServiceState.LISTENING, ServiceState.STOPPED],
  [ServiceState.LISTENING]: [ServiceState.DRAINING],
  [ServiceState.DRAINING]: [ServiceState.STOPPED],
  [ServiceState.STOPPED]: []
};

export type TransitionListener = (from: ServiceState, to: ServiceState) => void;

export class Lifecycle {
  private current = ServiceState.CONFIGURING;
  private readonly listeners: TransitionListener[] = [];

  get state(): ServiceState {
    return this.current;
  }

  canTransition(to: ServiceState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ServiceState): void {
    const from = this.current;
    if (!this.canTransition(to)) {
      throw new Error(`Invalid lifecycle transition: ${from} -> ${to}`);
    }

    this.current = to;
    log.debug('Lifecycle transition', { from, to });

    for (const listener of this.listeners) {
      listener(from, to);
    }
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }
}
