export { FsBrandReferenceProbe, REFERENCE_EXTENSIONS } from './probe.js';
export type { BrandReferenceProbe } from './probe.js';
