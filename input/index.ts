export { extractCharacteristics } from './characteristics';
export {
  signatureFromCharacteristics,
  signatureFromFormat,
  signatureMatches,
} from './signature';
export type { CategorySignature } from './signature';
export { classifyInput, couldBeAddress, publicKeyPossibilities } from './classifier';
