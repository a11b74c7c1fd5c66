/**
 * Selection providers
 *
 * Sources of routing decisions. Hosts plug in their own flag service or
 * configuration store; the in-memory and environment implementations cover
 * tests and simple deployments.
 */

import type { MaybePromise, ResolutionContext } from '../types';

export interface FeatureFlagProvider {
  isEnabled(flagName: string, context: ResolutionContext): MaybePromise<boolean>;
  /** Variant name for multi-variant flags; required by the variantFlag mode */
  getVariant?(flagName: string, context: ResolutionContext): MaybePromise<string | undefined>;
}

export interface ConfigurationProvider {
  get(key: string): MaybePromise<string | undefined>;
}

/**
 * Resolves the subject used by sticky routing.
 * When absent the dispatcher reads `subjectId` from the resolution context.
 */
export interface IdentityProvider {
  getSubjectId(context: ResolutionContext): MaybePromise<string | undefined>;
}

/**
 * Custom selection mode, registered by identifier and referenced from
 * experiment definitions through `usingCustomMode(identifier)`.
 */
export interface SelectionModeProvider {
  readonly modeIdentifier: string;
  /** Trial key to run, or undefined for the default trial */
  resolve(selectorName: string, context: ResolutionContext): MaybePromise<string | undefined>;
}

// ============================================================================
// In-memory implementations
// ============================================================================

export class InMemoryFeatureFlagProvider implements FeatureFlagProvider {
  private readonly flags = new Map<string, boolean>();
  private readonly variants = new Map<string, string>();

  setFlag(flagName: string, enabled: boolean): this {
    this.flags.set(flagName, enabled);
    return this;
  }

  setVariant(flagName: string, variant: string | undefined): this {
    if (variant === undefined) {
      this.variants.delete(flagName);
    } else {
      this.variants.set(flagName, variant);
    }
    return this;
  }

  isEnabled(flagName: string): boolean {
    return this.flags.get(flagName) ?? false;
  }

  getVariant(flagName: string): string | undefined {
    return this.variants.get(flagName);
  }

  clear(): void {
    this.flags.clear();
    this.variants.clear();
  }
}

export class InMemoryConfigurationProvider implements ConfigurationProvider {
  private readonly values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  set(key: string, value: string): this {
    this.values.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

/**
 * Reads configuration keys from environment variables.
 * `Experiments:Checkout` is looked up as `Experiments__Checkout`, then verbatim.
 */
export class EnvConfigurationProvider implements ConfigurationProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(key: string): string | undefined {
    const value = this.env[key.replace(/:/g, '__')] ?? this.env[key];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value.trim();
  }
}
