export { identify, identifyOrNull, deriveCandidate } from './identify';
export { detectAddress, normalizeAddress, scoreAddress } from './address-detector';
export { matchChains, matchAddress, matchPublicKey } from './matcher';
