export { TechDetector, detect, matcherHolds, createEmptyProfile } from './tech-detector.js';
