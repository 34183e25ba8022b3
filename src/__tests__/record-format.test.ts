import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { formatRecord, parseRecord, parseRecords, serializeRecords } from '../checklist/record-format';

describe('record format', () => {
  describe('formatRecord', () => {
    it('should write id, flag and text separated by single spaces', () => {
      assert.equal(formatRecord({ id: 1, completed: false, text: 'Buy milk' }), '1 0 Buy milk');
      assert.equal(formatRecord({ id: 2, completed: true, text: 'Finish report' }), '2 1 Finish report');
    });

    it('should keep a trailing separator for empty text', () => {
      assert.equal(formatRecord({ id: 4, completed: false, text: '' }), '4 0 ');
    });

    it('should flatten line breaks inside text', () => {
      assert.equal(formatRecord({ id: 3, completed: false, text: 'a\nb\r\nc\rd' }), '3 0 a b c d');
    });
  });

  describe('serializeRecords', () => {
    it('should terminate every record with a newline', () => {
      const body = serializeRecords([
        { id: 1, completed: false, text: 'Buy milk' },
        { id: 2, completed: true, text: 'Finish report' },
      ]);
      assert.equal(body, '1 0 Buy milk\n2 1 Finish report\n');
    });

    it('should produce an empty body for no tasks', () => {
      assert.equal(serializeRecords([]), '');
    });
  });

  describe('parseRecord', () => {
    it('should skip leading whitespace and one separator', () => {
      assert.deepEqual(parseRecord('  12   0 hello'), { id: 12, completed: false, text: 'hello' });
    });

    it('should keep the rest of the line verbatim', () => {
      assert.deepEqual(parseRecord('5 0   padded  text  '), { id: 5, completed: false, text: '  padded  text  ' });
    });

    it('should accept a tab as separator', () => {
      assert.deepEqual(parseRecord('1\t0\tTabbed'), { id: 1, completed: false, text: 'Tabbed' });
    });

    it('should treat any nonzero flag as completed', () => {
      assert.equal(parseRecord('7 2 x')?.completed, true);
      assert.equal(parseRecord('7 -1 x')?.completed, true);
    });

    it('should give empty text when nothing follows the flag', () => {
      assert.deepEqual(parseRecord('9 1'), { id: 9, completed: true, text: '' });
    });

    it('should reject lines without two leading integers', () => {
      assert.equal(parseRecord('not a record'), null);
      assert.equal(parseRecord('2'), null);
      assert.equal(parseRecord('2 x y'), null);
    });

    it('should reject integers outside the safe range', () => {
      assert.equal(parseRecord('99999999999999999999 0 x'), null);
    });
  });

  describe('parseRecords', () => {
    it('should decode records in file order', () => {
      assert.deepEqual(parseRecords('1 0 Buy milk\n2 1 Finish report\n'), [
        { id: 1, completed: false, text: 'Buy milk' },
        { id: 2, completed: true, text: 'Finish report' },
      ]);
    });

    it('should return nothing for empty content', () => {
      assert.deepEqual(parseRecords(''), []);
    });

    it('should skip blank lines', () => {
      const records = parseRecords('\n1 0 a\n\n   \n2 1 b\n');
      assert.deepEqual(records.map(r => r.id), [1, 2]);
    });

    it('should strip carriage returns from CRLF files', () => {
      const records = parseRecords('1 0 a\r\n2 1 b\r\n');
      assert.deepEqual(records.map(r => r.text), ['a', 'b']);
    });

    it('should stop at the first malformed line', () => {
      const records = parseRecords('1 0 a\nnot a record\n3 0 c\n');
      assert.deepEqual(records, [{ id: 1, completed: false, text: 'a' }]);
    });

    it('should stop at a line with a single integer', () => {
      const records = parseRecords('1 0 a\n2\n3 0 c');
      assert.equal(records.length, 1);
    });

    it('should read a last line without a trailing newline', () => {
      const records = parseRecords('1 0 a\n2 1 b');
      assert.deepEqual(records[1], { id: 2, completed: true, text: 'b' });
    });
  });
});
