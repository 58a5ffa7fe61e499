/**
 * Validator registry.
 * Maps validator names to factories; instances are created on first use.
 */
import type { Document } from '../core/parsing/document.js';
import type { Validator } from './types.js';

/**
 * Factory function for creating validators.
 * Used for lazy instantiation.
 */
export type ValidatorFactory = () => Validator;

interface ValidatorRegistration {
  factory: ValidatorFactory;
  instance?: Validator;
}

export class ValidatorRegistry {
  private registrations = new Map<string, ValidatorRegistration>();

  /**
   * Register a validator under a unique name.
   * Re-registering a name replaces the previous factory.
   */
  register(name: string, factory: ValidatorFactory): void {
    this.registrations.set(name, { factory });
  }

  /**
   * Get a validator by name, creating it on first access.
   */
  get(name: string): Validator | null {
    const registration = this.registrations.get(name);

    if (!registration) {
      return null;
    }

    if (!registration.instance) {
      registration.instance = registration.factory();
    }

    return registration.instance;
  }

  /**
   * Every registered validator that supports the document, in registration order.
   */
  getForDocument(document: Document): Validator[] {
    const validators: Validator[] = [];
    for (const name of this.registrations.keys()) {
      const validator = this.get(name);
      if (validator && validator.supports(document)) {
        validators.push(validator);
      }
    }
    return validators;
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  getRegisteredValidators(): string[] {
    return Array.from(this.registrations.keys());
  }

  /**
   * Clear all registrations.
   * Mainly for testing.
   */
  clear(): void {
    this.registrations.clear();
  }
}

/**
 * Global validator registry instance.
 */
export const validatorRegistry = new ValidatorRegistry();
