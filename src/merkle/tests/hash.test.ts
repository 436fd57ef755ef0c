import { keccak256, hashPair, compareHashes, parseHash, isHashHex, toHex } from '../hash';
import { MerkleInputError } from '../errors';

describe('keccak256', () => {
  it('should match the empty-input digest', () => {
    expect(toHex(keccak256())).toBe(
      'c5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470'
    );
  });

  it('should match the digest of "abc"', () => {
    expect(toHex(keccak256(Buffer.from('abc')))).toBe(
      '4e03657aea45a94fc7d47ba826c8d667c0d1e6e33a64a036ec44f58fa12d6c45'
    );
  });

  it('should hash the concatenation of its parts', () => {
    const joined = keccak256(Buffer.from('ab'), Buffer.from('c'));
    expect(joined.equals(keccak256(Buffer.from('abc')))).toBe(true);
  });

  it('should produce 32 bytes', () => {
    expect(keccak256(Buffer.from('test'))).toHaveLength(32);
  });
});

describe('compareHashes', () => {
  it('should order by the first differing byte', () => {
    const low = Buffer.alloc(32, 0);
    const high = Buffer.alloc(32, 0);
    high[31] = 1;
    expect(compareHashes(low, high)).toBeLessThan(0);
    expect(compareHashes(high, low)).toBeGreaterThan(0);
    expect(compareHashes(low, Buffer.alloc(32, 0))).toBe(0);
  });

  it('should treat the first byte as most significant', () => {
    const a = Buffer.alloc(32, 0xff);
    a[0] = 0x01;
    const b = Buffer.alloc(32, 0x00);
    b[0] = 0x02;
    expect(compareHashes(a, b)).toBeLessThan(0);
  });
});

describe('hashPair', () => {
  const a = Buffer.alloc(32, 0x01);
  const b = Buffer.alloc(32, 0x02);

  it('should not depend on argument order', () => {
    expect(hashPair(a, b).equals(hashPair(b, a))).toBe(true);
  });

  it('should hash the smaller value first', () => {
    expect(hashPair(b, a).equals(keccak256(a, b))).toBe(true);
    expect(hashPair(b, a).equals(keccak256(b, a))).toBe(false);
  });

  it('should hash a value with itself', () => {
    expect(hashPair(a, a).equals(keccak256(a, a))).toBe(true);
  });
});

describe('parseHash', () => {
  it('should decode 64 hex characters', () => {
    const hex = 'ab'.repeat(32);
    expect(parseHash(hex).equals(Buffer.alloc(32, 0xab))).toBe(true);
  });

  it('should accept uppercase hex', () => {
    expect(parseHash('AB'.repeat(32)).equals(Buffer.alloc(32, 0xab))).toBe(true);
  });

  it('should reject wrong lengths and non-hex characters', () => {
    expect(() => parseHash('ab'.repeat(31))).toThrow(MerkleInputError);
    expect(() => parseHash('zz'.repeat(32))).toThrow(MerkleInputError);
    expect(() => parseHash('0x' + 'ab'.repeat(31))).toThrow(MerkleInputError);
  });

  it('should name the value in the error', () => {
    expect(() => parseHash('nope', 'root')).toThrow('Invalid root: expected 64 hex characters');
  });
});

describe('isHashHex', () => {
  it('should only accept 64-char hex strings', () => {
    expect(isHashHex('00'.repeat(32))).toBe(true);
    expect(isHashHex('00'.repeat(33))).toBe(false);
    expect(isHashHex(42)).toBe(false);
    expect(isHashHex(undefined)).toBe(false);
  });
});
