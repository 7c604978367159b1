/**
 * Read-only registry of the optional features a build may enable
 */

import { z } from 'zod';
import { FeatureCategory, FeatureSpec, ProbeStrategy } from '../types';
import { ForgeError, ForgeErrorCode } from '../errors';
import featureDefinitions from './features.json';

const probeSchema = z.object({
  strategy: z.nativeEnum(ProbeStrategy),
  target: z.string().min(1)
});

const featureSchema = z
  .object({
    name: z.string().trim().min(1),
    description: z.string().default(''),
    category: z.nativeEnum(FeatureCategory),
    probeStrategy: z.nativeEnum(ProbeStrategy),
    probeTarget: z.string().default(''),
    alternateProbes: z.array(probeSchema).default([]),
    flags: z.array(z.string().min(1)).default([]),
    detectionOnly: z.boolean().default(false),
    defaultRequested: z.boolean().default(false),
    minimalTier: z.boolean().default(false)
  })
  .superRefine((feature, ctx) => {
    if (feature.flags.length === 0 && !feature.detectionOnly) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'flags must not be empty unless detectionOnly is set' });
    }
    if (feature.flags.length > 0 && feature.detectionOnly) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'detection-only features emit no flags' });
    }
    if (feature.probeStrategy !== ProbeStrategy.AlwaysTrue && feature.probeTarget.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `probeTarget is required for ${feature.probeStrategy}` });
    }
    if (feature.minimalTier && feature.probeStrategy !== ProbeStrategy.AlwaysTrue) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minimal-tier features must not depend on a probe' });
    }
  });

const catalogSchema = z.array(featureSchema);

export type FeatureDefinition = z.input<typeof featureSchema>;

/**
 * Registration order is the total order used for probing results and
 * flag assembly.
 */
export class FeatureCatalog {
  private readonly features: readonly FeatureSpec[];
  private readonly index: ReadonlyMap<string, FeatureSpec>;

  private constructor(features: FeatureSpec[]) {
    this.features = Object.freeze(features);
    this.index = new Map(features.map(feature => [feature.name, feature]));
  }

  /**
   * Validate raw definitions and build a frozen catalog
   */
  static fromDefinitions(definitions: unknown): FeatureCatalog {
    const parsed = catalogSchema.safeParse(definitions);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ForgeError(ForgeErrorCode.InvalidCatalog, issues.join('; '));
    }

    const seen = new Set<string>();
    const features = parsed.data.map(definition => {
      if (seen.has(definition.name)) {
        throw new ForgeError(ForgeErrorCode.InvalidCatalog, `duplicate feature name: ${definition.name}`);
      }
      seen.add(definition.name);

      const spec: FeatureSpec = {
        ...definition,
        alternateProbes: Object.freeze(definition.alternateProbes.map(probe => Object.freeze({ ...probe }))),
        flags: Object.freeze([...definition.flags])
      };
      return Object.freeze(spec);
    });

    return new FeatureCatalog(features);
  }

  lookup(name: string): FeatureSpec | undefined {
    return this.index.get(name);
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  /** All features in registration order */
  list(): readonly FeatureSpec[] {
    return this.features;
  }

  get size(): number {
    return this.features.length;
  }

  /** Names of the default-on tier, in registration order */
  defaultFeatureNames(): string[] {
    return this.features.filter(feature => feature.defaultRequested).map(feature => feature.name);
  }

  /** Features whose flags are kept by the minimal fallback */
  minimalFeatures(): FeatureSpec[] {
    return this.features.filter(feature => feature.minimalTier);
  }
}

let defaultCatalog: FeatureCatalog | undefined;

/**
 * The catalog bundled with the toolchain, loaded once per process
 */
export function getDefaultCatalog(): FeatureCatalog {
  if (!defaultCatalog) {
    defaultCatalog = FeatureCatalog.fromDefinitions(featureDefinitions);
  }
  return defaultCatalog;
}
