import fs from 'fs';
import { fileURLToPath } from 'url';
import { SignatureFileSchema, type SignatureFile, type SignatureMatcherFileEntry } from '../schemas/technology.js';
import { SignatureLoadError } from '../errors.js';
import type { SignatureMatcher, SignatureRuleSet } from '../types/index.js';

// Resolves to <root>/data from both src/signatures and dist/signatures
export const DEFAULT_SIGNATURE_FILE = fileURLToPath(new URL('../../data/signatures.json', import.meta.url));

// Case-insensitive, and ^/$ anchor at header line boundaries
const PATTERN_FLAGS = 'im';

let defaultRuleSet: SignatureRuleSet | null = null;

function compileMatcher(entry: SignatureMatcherFileEntry): SignatureMatcher {
  return Object.freeze({
    source: entry.source,
    patterns: entry.patterns.map((pattern) => new RegExp(pattern, PATTERN_FLAGS)),
  });
}

export function compileSignatureFile(file: SignatureFile): SignatureRuleSet {
  const signatures = file.signatures.map((entry) =>
    Object.freeze({
      category: entry.category,
      name: entry.name,
      match: compileMatcher(entry.match),
      and: entry.and ? compileMatcher(entry.and) : undefined,
    })
  );

  const overrides = file.overrides.map((entry) =>
    Object.freeze({
      suppress: Object.freeze({ ...entry.suppress }),
      when: compileMatcher(entry.when),
      redirect: entry.redirect ? Object.freeze({ ...entry.redirect }) : undefined,
    })
  );

  return Object.freeze({
    signatures: Object.freeze(signatures),
    overrides: Object.freeze(overrides),
  });
}

export function parseSignatureFile(raw: unknown): SignatureRuleSet {
  const parsed = SignatureFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new SignatureLoadError(where);
  }
  return compileSignatureFile(parsed.data);
}

export function loadSignatureRules(filePath: string = DEFAULT_SIGNATURE_FILE): SignatureRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new SignatureLoadError(`${filePath}: ${errorMessage}`);
  }
  return parseSignatureFile(raw);
}

export function getDefaultRuleSet(): SignatureRuleSet {
  if (!defaultRuleSet) {
    defaultRuleSet = loadSignatureRules();
  }
  return defaultRuleSet;
}
