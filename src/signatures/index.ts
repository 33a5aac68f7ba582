export {
  DEFAULT_SIGNATURE_FILE,
  compileSignatureFile,
  parseSignatureFile,
  loadSignatureRules,
  getDefaultRuleSet,
} from './rules.js';
