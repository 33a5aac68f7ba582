// Technology taxonomy and signature types

export type Category =
  | 'cms'
  | 'web_frameworks'
  | 'programming_languages'
  | 'javascript_frameworks'
  | 'javascript_libraries'
  | 'ui_frameworks'
  | 'analytics'
  | 'tag_managers'
  | 'cdn'
  | 'caching'
  | 'reverse_proxies'
  | 'font_scripts'
  | 'security'
  | 'cookie_compliance'
  | 'rum'
  | 'performance'
  | 'hosting'
  | 'miscellaneous';

/** Which response text a matcher reads. `any` matches headers or body. */
export type SignatureSource = 'headers' | 'body' | 'any';

export interface SignatureMatcher {
  source: SignatureSource;
  patterns: RegExp[];
}

export interface Signature {
  category: Category;
  name: string;
  match: SignatureMatcher;
  /** Second condition that must also hold, possibly against the other source. */
  and?: SignatureMatcher | undefined;
}

export interface TechnologyRef {
  category: Category;
  name: string;
}

/**
 * Applied after the base pass: when `suppress` was detected and `when` holds,
 * it is removed and `redirect` (if any) is added in its place.
 */
export interface SignatureOverride {
  suppress: TechnologyRef;
  when: SignatureMatcher;
  redirect?: TechnologyRef | undefined;
}

export interface SignatureRuleSet {
  signatures: readonly Signature[];
  overrides: readonly SignatureOverride[];
}

export type TechProfile = Readonly<Record<Category, readonly string[]>>;
