import assert from 'assert';
import { createHash } from 'crypto';
import { canonicalRow, computeRowHash, renderCellValue } from '../../../src/sync/row-hash.ts';

describe('renderCellValue', () => {
  it('renders absent values as empty text', () => {
    assert.strictEqual(renderCellValue(null), '');
    assert.strictEqual(renderCellValue(undefined), '');
    assert.strictEqual(renderCellValue(Number.NaN), '');
  });

  it('renders numbers and keeps text', () => {
    assert.strictEqual(renderCellValue(2.5), '2.5');
    assert.strictEqual(renderCellValue(' x '), ' x ');
  });
});

describe('canonicalRow', () => {
  it('sorts columns by name and stringifies values', () => {
    assert.strictEqual(canonicalRow({ b: 2, a: 'x' }), '[["a","x"],["b","2"]]');
  });

  it('leaves out blank values', () => {
    assert.strictEqual(canonicalRow({ b: 2, a: null, c: '' }), '[["b","2"]]');
  });

  it('reads only the given columns', () => {
    assert.strictEqual(canonicalRow({ Name: 'bob', Email: 'bob@example.com' }, ['Name']), '[["Name","bob"]]');
  });
});

describe('computeRowHash', () => {
  it('is the SHA-256 hex digest of the canonical row', () => {
    const expected = createHash('sha256').update('[["Name","bob"],["Phone","555"]]', 'utf8').digest('hex');

    assert.strictEqual(computeRowHash({ Phone: '555', Name: 'bob' }), expected);
  });

  it('ignores key order', () => {
    assert.strictEqual(computeRowHash({ a: '1', b: 'x' }), computeRowHash({ b: 'x', a: '1' }));
  });

  it('treats a number and its text form alike', () => {
    assert.strictEqual(computeRowHash({ Amount: 10 }), computeRowHash({ Amount: '10' }));
  });

  it('differs when any value differs', () => {
    assert.notStrictEqual(computeRowHash({ a: '1', b: 'x' }), computeRowHash({ a: '1', b: 'y' }));
    assert.notStrictEqual(computeRowHash({ a: 'x' }), computeRowHash({ b: 'x' }));
  });

  it('hashes an absent column and a blank cell alike', () => {
    assert.strictEqual(computeRowHash({ Name: 'bob' }), computeRowHash({ Name: 'bob', Email: '' }));
    assert.strictEqual(computeRowHash({ Name: 'bob' }), computeRowHash({ Name: 'bob', Email: null }));
  });

  it('ignores columns outside the written set', () => {
    assert.strictEqual(computeRowHash({ Name: 'bob', Email: 'bob@example.com' }, ['Name']), computeRowHash({ Name: 'bob' }));
  });
});
