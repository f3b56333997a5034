/**
 * Startup PIN check with a bounded number of attempts.
 * The gate reports exhaustion; ending the session is up to the caller.
 */
import { verifyPin } from './pinHash.js';
import { AuthExhaustedError } from '../errors.js';

export const DEFAULT_PIN_ATTEMPTS = 3;

/** Returns the entered PIN, or null when the user cancels */
export type PinPrompt = (remaining: number) => Promise<string | null> | string | null;

export class CredentialGate {
  private failures = 0;
  private opened: boolean;

  constructor(
    private readonly storedHash: string | null,
    readonly maxAttempts: number = DEFAULT_PIN_ATTEMPTS,
  ) {
    this.opened = storedHash === null;
  }

  get unlocked(): boolean {
    return this.opened;
  }

  get exhausted(): boolean {
    return !this.opened && this.failures >= this.maxAttempts;
  }

  get remaining(): number {
    return this.opened ? this.maxAttempts : Math.max(0, this.maxAttempts - this.failures);
  }

  /**
   * Check one entry. Returns false on a wrong PIN with attempts left;
   * throws AuthExhaustedError on the last failure and on every call after it.
   */
  attempt(pin: string): boolean {
    if (this.storedHash === null || this.opened) {
      this.opened = true;
      return true;
    }
    if (this.exhausted) {
      throw new AuthExhaustedError(this.maxAttempts);
    }

    if (verifyPin(pin, this.storedHash)) {
      this.opened = true;
      return true;
    }

    this.failures++;
    if (this.exhausted) {
      throw new AuthExhaustedError(this.maxAttempts);
    }
    return false;
  }

  /**
   * Prompt until the PIN matches. Resolves false if the prompt is cancelled;
   * rejects with AuthExhaustedError when attempts run out.
   */
  async unlock(askPin: PinPrompt): Promise<boolean> {
    while (!this.opened) {
      const pin = await askPin(this.remaining);
      if (pin === null) return false;
      this.attempt(pin);
    }
    return true;
  }
}
