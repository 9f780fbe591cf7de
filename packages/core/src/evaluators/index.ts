export { evaluateVendor }          from './vendor.js';
export type { VendorEvaluation }   from './vendor.js';
export { evaluateRecency, ageInDays } from './recency.js';
export { evaluateAdoption }        from './adoption.js';
export { evaluateVulnerabilities } from './vulnerability.js';
export type { VulnerabilityEvaluation } from './vulnerability.js';
export { evaluateSignature }       from './signature.js';
