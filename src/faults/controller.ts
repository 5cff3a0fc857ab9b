import type { FaultCode, FaultConfig, FaultTrigger } from './types.js';

type FaultEnv = Record<string, string | undefined>;

class FaultController {
  private config: FaultConfig = {
    enabled: false,
    triggers: {},
  };

  initialize(env: FaultEnv = process.env): void {
    const enabled = env.FAULTS_ENABLED === 'true';
    
    if (!enabled) {
      this.config = { enabled: false, triggers: {} };
      return;
    }

    this.config = {
      enabled: true,
      triggers: {
        PAYOUT_FAILURE: this.parseTrigger(env.FAULT_PAYOUT_FAILURE),
        SNAPSHOT_WRITE_FAILURE: this.parseTrigger(env.FAULT_SNAPSHOT_WRITE_FAILURE),
        EVENT_WRITE_FAILURE: this.parseTrigger(env.FAULT_EVENT_WRITE_FAILURE),
      },
    };
  }

  reset(): void {
    this.config = { enabled: false, triggers: {} };
  }

  private parseTrigger(value: string | undefined): FaultTrigger {
    if (!value) return 'never';
    if (value === 'always') return 'always';
    if (value === 'never') return 'never';
    
    const prob = parseFloat(value);
    if (isNaN(prob) || prob < 0 || prob > 1) return 'never';
    return prob;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  shouldInject(faultCode: FaultCode): boolean {
    if (!this.config.enabled) return false;
    
    const trigger = this.config.triggers[faultCode];
    if (!trigger || trigger === 'never') return false;
    if (trigger === 'always') return true;
    
    return Math.random() < trigger;
  }

  getConfig(): Readonly<FaultConfig> {
    return this.config;
  }
}

export const faultController = new FaultController();
