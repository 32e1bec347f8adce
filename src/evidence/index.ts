export {
  makeEvidencePack,
  sqlHash,
  type EvidencePack,
  type EvidencePackInput,
  type EvidencePackOptions,
} from './pack.js';
