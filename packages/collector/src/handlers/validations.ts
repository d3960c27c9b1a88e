import type { ValidationReceivedEvent } from '../events.js';
import type { ValidationReconciler } from '../reconciliation.js';

/**
 * Validation events: counts every validation on the network and forwards
 * our own validator's to reconciliation. Our validator is recognized by
 * either its signing key or its master key.
 */
export class ValidationsHandler {
  constructor(
    private readonly engine: Pick<ValidationReconciler, 'onLocalValidation' | 'recordValidationChecked'>,
    private validatorKey: string | null = null
  ) {}

  get key(): string | null {
    return this.validatorKey;
  }

  setValidatorKey(key: string | null): void {
    this.validatorKey = key;
  }

  handle(event: ValidationReceivedEvent): void {
    this.engine.recordValidationChecked();

    const key = this.validatorKey;
    if (!key || !event.hash) return;
    if (event.validationPublicKey === key || event.masterKey === key) {
      this.engine.onLocalValidation(event.sequence, event.hash);
    }
  }
}
