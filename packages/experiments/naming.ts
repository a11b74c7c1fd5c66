/**
 * Naming conventions for feature flags and configuration keys.
 *
 * A selection mode declared without an explicit selector name falls back to
 * the name produced here.
 */

export interface NamingConvention {
  /** Feature flag consulted by flag-based modes and used to salt sticky routing */
  featureFlagNameFor(service: { readonly name: string }): string;
  /** Multi-variant flag consulted by the variantFlag mode */
  variantFlagNameFor(service: { readonly name: string }): string;
  /** Configuration key consulted by the configurationValue mode */
  configurationKeyFor(service: { readonly name: string }): string;
}

/** Flag = service name, configuration key = `Experiments:<service>` */
export const defaultNamingConvention: NamingConvention = Object.freeze({
  featureFlagNameFor: (service: { readonly name: string }) => service.name,
  variantFlagNameFor: (service: { readonly name: string }) => service.name,
  configurationKeyFor: (service: { readonly name: string }) => `Experiments:${service.name}`,
});

/**
 * Kebab-case convention: `IPaymentGateway` becomes `payment-gateway` for flags
 * and `experiments:payment-gateway` for configuration.
 * A leading `I` is dropped only when followed by another capital.
 */
export const kebabCaseNamingConvention: NamingConvention = Object.freeze({
  featureFlagNameFor: (service: { readonly name: string }) => toKebabCase(service.name),
  variantFlagNameFor: (service: { readonly name: string }) => toKebabCase(service.name),
  configurationKeyFor: (service: { readonly name: string }) => `experiments:${toKebabCase(service.name)}`,
});

export function toKebabCase(name: string): string {
  const stripped = /^I[A-Z]/.test(name) ? name.slice(1) : name;
  return stripped
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .replace(/[\s_.]+/g, '-')
    .toLowerCase();
}
