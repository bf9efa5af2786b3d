import { ConfigError, deepFreeze } from "./util.js";

export type TaxonomySpec = {
  vocabulary: string[];
  indicators: Record<string, string>;
  broadCategories: Record<string, string[]>;
  noSignal: { broad: string; specific: string };
  primaryLabels: Record<string, string>;
  order: { primary: string[]; broad: string[]; specific: string[] };
};

export type Taxonomy = {
  readonly vocabulary: readonly string[];
  readonly noSignal: { readonly broad: string; readonly specific: string };
  readonly order: {
    readonly primary: readonly string[];
    readonly broad: readonly string[];
    readonly specific: readonly string[];
  };
  specificTopicFor(indicator: string): string;
  broadCategoryFor(specific: string): string;
  displayLabelFor(primary: string): string;
};

/**
 * Validates the mapping tables and returns a frozen lookup.
 *
 * The indicator → topic → broad category mapping must form a tree: every
 * vocabulary indicator maps to one topic and every topic to exactly one broad
 * category. Anything else is a configuration error raised here, before any
 * rows are read.
 */
export function buildTaxonomy(spec: TaxonomySpec): Taxonomy {
  const vocabulary = [...new Set(spec.vocabulary)];
  const known = new Set(vocabulary);
  const topicByIndicator = new Map<string, string>();
  for (const [indicator, topic] of Object.entries(spec.indicators)) {
    if (!known.has(indicator)) {
      throw new ConfigError(`taxonomy: indicator '${indicator}' is not in the vocabulary`);
    }
    topicByIndicator.set(indicator, topic);
  }
  const unmapped = vocabulary.filter((v) => !topicByIndicator.has(v));
  if (unmapped.length > 0) {
    throw new ConfigError(`taxonomy: no topic for indicator(s) ${unmapped.join(", ")}`);
  }

  const broadByTopic = new Map<string, string>();
  for (const [broad, topics] of Object.entries(spec.broadCategories)) {
    for (const topic of topics) {
      const prev = broadByTopic.get(topic);
      if (prev !== undefined && prev !== broad) {
        throw new ConfigError(`taxonomy: topic '${topic}' belongs to both '${prev}' and '${broad}'`);
      }
      broadByTopic.set(topic, broad);
    }
  }
  const topics = new Set([...topicByIndicator.values(), spec.noSignal.specific]);
  const orphans = [...topics].filter((t) => !broadByTopic.has(t));
  if (orphans.length > 0) {
    throw new ConfigError(`taxonomy: no broad category for topic(s) ${orphans.join(", ")}`);
  }
  if (broadByTopic.get(spec.noSignal.specific) !== spec.noSignal.broad) {
    throw new ConfigError(
      `taxonomy: no-signal topic '${spec.noSignal.specific}' must belong to '${spec.noSignal.broad}'`,
    );
  }

  const primaryLabels = new Map(Object.entries(spec.primaryLabels));

  return deepFreeze({
    vocabulary,
    noSignal: { ...spec.noSignal },
    order: {
      primary: [...spec.order.primary],
      broad: [...spec.order.broad],
      specific: [...spec.order.specific],
    },
    specificTopicFor(indicator: string): string {
      const topic = topicByIndicator.get(indicator);
      if (topic === undefined) throw new ConfigError(`taxonomy: unknown indicator '${indicator}'`);
      return topic;
    },
    broadCategoryFor(specific: string): string {
      const broad = broadByTopic.get(specific);
      if (broad === undefined) throw new ConfigError(`taxonomy: unknown topic '${specific}'`);
      return broad;
    },
    displayLabelFor(primary: string): string {
      return primaryLabels.get(primary) ?? primary;
    },
  });
}
