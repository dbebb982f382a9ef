/**
 * Test vectors for codecs, hashes and derivation
 * Based on BIP-173/350, EIP-55, Bitcoin and Substrate standards
 */

// =============================================================================
// Hash Test Vectors
// =============================================================================

export const HASH_VECTORS = {
  sha256: [
    { input: '', expected: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855' },
    {
      input: '616263', // "abc" in hex
      expected: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    },
  ],
  doubleSha256: [
    { input: '', expected: '5df6e0e2761359d30a8275058e299fcc0381534545f55cf43e41983f5d4c9456' },
    {
      input: '68656c6c6f', // "hello" in hex
      expected: '9595c9df90075148eb06860365df33584b75bff782a510c6cd4883a419833d50',
    },
  ],
  keccak256: [
    { input: '', expected: 'c5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470' },
    { input: '616263', expected: '4e03657aea45a94fc7d47ba826c8d667c0d1e6e33a64a036ec44f58fa12d6c45' },
  ],
  sha3_256: [
    { input: '', expected: 'a7ffc6f8bf1ed76651c14756a061d662f580ff4de43b49fa82d80a4b80f8434a' },
    { input: '616263', expected: '3a985da74fe225b2045c172d6bd390bd855f086e3e9d525b46bfe24511431532' },
  ],
  ripemd160: [
    { input: '', expected: '9c1185a5c5e9fc54612808977ee8f548b2258d31' },
    {
      input: '68656c6c6f', // "hello" in hex
      expected: '108f07b8382412612c048d07d13f814118445acd',
    },
  ],
  hash160: [
    // SHA256 then RIPEMD160
    {
      input: '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798', // compressed pubkey
      expected: '751e76e8199196d454941c45d1b3a323f1433bd6',
    },
  ],
  blake2b256: [
    { input: '', expected: '0e5751c026e543b2e8ab2eb06099daa1d1e5df47778f7787faab45cdf12fe3a8' },
    { input: '616263', expected: 'bddd813c634239723171ef3fee98579b94964e3bb1cb3e427262c8c068d52319' },
  ],
  blake2b512: [
    {
      input: '',
      expected:
        '786a02f742015903c6c6fd852552d272912f4740e15847618a86e217f71f5419d25e1031afee585313896444934eb04b903a685b1448b755d56f701afe9be2ce',
    },
  ],
};

// =============================================================================
// Base58 Test Vectors
// =============================================================================

export const BASE58_VECTORS = [
  { hex: '00', base58: '1' },
  { hex: '0000', base58: '11' },
  {
    // "Hello World" in hex
    hex: '48656c6c6f20576f726c64',
    base58: 'JxF12TrwUP45BMd',
  },
  { hex: 'ff', base58: '5Q' },
];

export const BASE58CHECK_VECTORS = [
  {
    // Bitcoin genesis coinbase address
    address: '1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa',
    version: 0x00,
    payload: '62e907b15cbf27d5425399ebf6f0fb50ebb88f18',
  },
  {
    address: '3J98t1WpEZ73CNmQviecrnyiWrnqRhWNLy',
    version: 0x05,
    payload: 'b472a266d0bd89c13706a4132ccfb16f7c3b9fcb',
  },
  {
    address: 'TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t',
    version: 0x41,
    payload: 'a614f803b6fd780986a42c78ec9c7f77e6ded13c',
  },
  {
    // hash160 of the secp256k1 generator point, compressed
    address: '1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH',
    version: 0x00,
    payload: '751e76e8199196d454941c45d1b3a323f1433bd6',
  },
];

// =============================================================================
// Bech32 Test Vectors
// =============================================================================

export const BECH32_VECTORS = {
  valid: ['A12UEL5L', 'a12uel5l', 'abcdef1qpzry9x8gf2tvdw0s3jn54khce6mua7lmqqqxw'],
  validM: ['A1LQFN3A', 'a1lqfn3a'],
  segwitV0: 'bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4',
  taproot: 'bc1p0xlxvlhemja6c4dqv22uapctqupfhlxm9h8z3k2e72q4k9hcz7vqzk5jj0',
  invalid: [
    '', // empty
    'bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t5', // bad checksum
    'bcqw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4', // no separator
    'Bc1qW508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4', // mixed case
    '1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqq', // empty HRP
    'a1qqqqq', // data shorter than checksum
  ],
};

// =============================================================================
// EIP-55 Test Vectors
// =============================================================================

export const EIP55_VECTORS = [
  '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed',
  '0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359',
  '0xdbF03B407c01E7cD3CBea99509d93f8DDDC8C6FB',
  '0xD1220A0cf47c7B9Be7A2E6BA89F429762e7b9aDb',
  '0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045',
];

// =============================================================================
// SS58 Test Vectors
// =============================================================================

/** Well-known development account public key */
export const SS58_ACCOUNT_ID = 'd43593c715fdd31c61141abd04a99fd6822c8558854ccde39a5684e7a56da27d';

export const SS58_VECTORS = [
  { prefix: 0, address: '15oF4uVJwmo4TdGW7VfQxNLavjCXviqxT9S1MgbjMNHr6Sp5' },
  { prefix: 2, address: 'HNZata7iMYWmk5RvZRTiAsSDhV8366zq2YGb3tLH5Upf74F' },
  { prefix: 42, address: '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY' },
  // Two-byte prefixes
  { prefix: 100, address: 'VMraZvaVJBei91DsJBixwQiDEVARedkDmqmNJrXpqkVudENRF' },
  { prefix: 16383, address: 'yNa8JpqfFB3q8A29rCwSgxvdU94ufJw2yKKxDgznS5m1PoFvn' },
];

// =============================================================================
// secp256k1 Key Test Vectors (private key = 1)
// =============================================================================

export const SECP256K1_KEY = {
  compressed: '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798',
  uncompressed:
    '0479be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8',
  /** 0x02 followed by an x-coordinate above the field prime */
  offCurve: '02ffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff',
};

/** Addresses derived from the 64-byte X ‖ Y form of SECP256K1_KEY */
export const SECP256K1_DERIVED = {
  evm: '0x7e5f4552091a69125d5dfcb7b8c2659029395bdf',
  evmChecksummed: '0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf',
  bitcoinP2pkh: '1KGYN13Exrsyx7CnsEGMVbD8oUwHta2ZsG',
  bitcoinBech32: 'bc1ep32a6uy98wztfuchfg6gg4584l8zfsxddrgrs',
  litecoinP2pkh: 'LdVVdDM53X83Cutx3NFemcGu1hJa45QYEj',
  litecoinBech32: 'ltc1ep32a6uy98wztfuchfg6gg4584l8zfsx8ywhg9',
  dogecoinP2pkh: 'DPQduFytGGnGV7PPbpFv3MNjgcfbHsotQA',
  tron: 'TMVQGm1qAQYVdetCeGRRkTWYYrLXuHK2HC',
  ss58Prefix0: '127BZ663eBkPH1bTybpBH1npbaR3TqTng3SnrNhLqmKjryCc',
};

// =============================================================================
// 32-byte Key Test Vectors
// =============================================================================

/** Placeholder key: bytes 0x01..0x20 */
export const ED25519_KEY = '0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20';

export const ED25519_DERIVED = {
  solana: '4wBqpZM9xaSheZzJSMawUKKwhdpChKbZ5eu5ky4Vigw',
  cosmos: 'cosmos14cskcth4y3ar0qkpxhh6y7drunxuvyy5t4s5fz',
  osmosis: 'osmo14cskcth4y3ar0qkpxhh6y7drunxuvyy5rwryls',
  polkadot: '12KeSVQBwS9AjRA976mnJouSAoQuS5bkWudT367GBEHE8Ls',
  kusama: 'CbeARaCxXBbUrE5xArpY7Lkj9611oLe8Q1tgQNiBtRFnrrh',
  substrate: '5C62W7ELLAAfjCQeBU3me9ykaYomD8XTg2B9Hk6ki6Cm3v58',
  /** header 0x61 */
  cardano: 'addr1vyydw6an63madua97fktvmrfzjr9g7k0nwavdnatlw3s0pqtujdxd',
  /** header 0x00 (default) */
  cardanoDefaultHeader: 'addr1qqydw6an63madua97fktvmrfzjr9g7k0nwavdnatlw3s0pq5hcu02',
};

/** A 44-character Base58 string that is also a 32-byte key */
export const AMBIGUOUS_BASE58 = {
  input: '9WzDXwBbmkg8ZTbNMqUxvQRAyrZzDsGYdLVL9zYtAWWM',
  keyHex: '7e8c088760bfde1dddcf32c17f209b8242ee52aaf131facd88d0ea2c6d0b06f2',
  cosmos: 'cosmos1jzsy806de8uvmr00r4lhetjpe5ygrasgfuxqem',
  polkadot: '13rvdfEpVmiWpMarrkmU8UZbYKmzpFZjUQ6kBcEscBcjCsk6',
};
