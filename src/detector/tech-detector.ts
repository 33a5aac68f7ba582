import { getDefaultRuleSet } from '../signatures/rules.js';
import { mapCategories } from '../utils/categories.js';
import type {
  Category,
  Signature,
  SignatureMatcher,
  SignatureOverride,
  SignatureRuleSet,
  TechProfile,
} from '../types/index.js';

type MutableProfile = Record<Category, Set<string>>;

export function matcherHolds(matcher: SignatureMatcher, headers: string, body: string): boolean {
  const test = (text: string): boolean =>
    text.length > 0 && matcher.patterns.some((pattern) => pattern.test(text));

  switch (matcher.source) {
    case 'headers':
      return test(headers);
    case 'body':
      return test(body);
    case 'any':
      return test(headers) || test(body);
  }
}

export function createEmptyProfile(): TechProfile {
  return Object.freeze(mapCategories((): readonly string[] => Object.freeze([])));
}

export class TechDetector {
  private readonly signatures: readonly Signature[];
  private readonly overrides: readonly SignatureOverride[];

  constructor(ruleSet?: SignatureRuleSet) {
    const rules = ruleSet ?? getDefaultRuleSet();
    this.signatures = rules.signatures;
    this.overrides = rules.overrides;
  }

  detect(headers: string, body: string): TechProfile {
    const found = this.emptySets();

    for (const sig of this.signatures) {
      if (this.fires(sig, headers, body)) {
        found[sig.category].add(sig.name);
      }
    }

    this.applyOverrides(found, headers, body);

    return this.freeze(found);
  }

  getSignatures(category?: Category): readonly Signature[] {
    if (!category) return this.signatures;
    return this.signatures.filter((sig) => sig.category === category);
  }

  private fires(sig: Signature, headers: string, body: string): boolean {
    if (!matcherHolds(sig.match, headers, body)) {
      return false;
    }
    return sig.and ? matcherHolds(sig.and, headers, body) : true;
  }

  // Overrides run in order after the base pass; a later override sees earlier edits
  private applyOverrides(found: MutableProfile, headers: string, body: string): void {
    for (const override of this.overrides) {
      const { suppress, when, redirect } = override;
      if (!found[suppress.category].has(suppress.name)) continue;
      if (!matcherHolds(when, headers, body)) continue;

      found[suppress.category].delete(suppress.name);
      if (redirect) {
        found[redirect.category].add(redirect.name);
      }
    }
  }

  private emptySets(): MutableProfile {
    return mapCategories(() => new Set<string>());
  }

  private freeze(found: MutableProfile): TechProfile {
    return Object.freeze(mapCategories((category) => Object.freeze([...found[category]])));
  }
}

let defaultDetector: TechDetector | null = null;

export function detect(headers: string, body: string): TechProfile {
  if (!defaultDetector) {
    defaultDetector = new TechDetector();
  }
  return defaultDetector.detect(headers, body);
}
