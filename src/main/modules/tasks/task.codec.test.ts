import { describe, expect, test } from '@jest/globals';
import {
  InvalidCompletedFlagError,
  InvalidIdError,
  MalformedRecordError,
} from '../../error/app.error';
import { Task } from '../../../@types/task';
import { decodeRecord, encodeRecord, escapeField, splitRecord } from './task.codec';
import { TaskModel } from './task.model';

describe('escapeField', () => {
  test('escapes every comma', () => {
    expect(escapeField('a,b,,c')).toBe('a\\,b\\,\\,c');
  });

  test('turns each line break character into a space', () => {
    expect(escapeField('one\ntwo\r\nthree')).toBe('one two  three');
  });

  test('leaves other characters alone', () => {
    expect(escapeField('C:\\temp "quoted" ;')).toBe('C:\\temp "quoted" ;');
  });
});

describe('splitRecord', () => {
  test('splits on unescaped commas only', () => {
    expect(splitRecord('1,0,a\\,b,c')).toEqual(['1', '0', 'a,b', 'c']);
  });

  test('keeps a backslash that does not precede a comma', () => {
    expect(splitRecord('1,0,C:\\temp,n')).toEqual(['1', '0', 'C:\\temp', 'n']);
  });

  test('keeps empty trailing fields', () => {
    expect(splitRecord('1,0,Clean,')).toEqual(['1', '0', 'Clean', '']);
  });
});

describe('encodeRecord', () => {
  test('writes id, flag, title and notes', () => {
    expect(encodeRecord(TaskModel.create(3, 'Buy milk', 'urgent', true))).toBe('3,1,Buy milk,urgent');
    expect(encodeRecord(TaskModel.create(1, 'Clean'))).toBe('1,0,Clean,');
  });

  test('escapes a comma in the title', () => {
    const line = encodeRecord(TaskModel.create(1, 'a,b'));
    expect(line).toBe('1,0,a\\,b,');
    expect(splitRecord(line)[2]).toBe('a,b');
  });

  test('drops line breaks', () => {
    const line = encodeRecord(TaskModel.create(2, 'first\nsecond', 'x\ry'));
    expect(line).toBe('2,0,first second,x y');
    expect(decodeRecord(line).title).toBe('first second');
  });
});

describe('decodeRecord', () => {
  test('decodes a completed task', () => {
    expect(decodeRecord('3,1,Buy milk,urgent')).toEqual({
      id: 3,
      title: 'Buy milk',
      notes: 'urgent',
      completed: true,
    });
  });

  test('decodes the escaped title back to a comma', () => {
    expect(decodeRecord('1,0,a\\,b,').title).toBe('a,b');
  });

  test('accepts negative ids', () => {
    expect(decodeRecord('-2,0,t,n').id).toBe(-2);
  });

  test('ignores fields after the fourth', () => {
    expect(decodeRecord('7,1,t,n,extra')).toEqual({ id: 7, title: 't', notes: 'n', completed: true });
  });

  test('rejects lines with fewer than four fields', () => {
    expect(() => decodeRecord('1,0,only three')).toThrow(MalformedRecordError);
    expect(() => decodeRecord('')).toThrow(MalformedRecordError);
  });

  test('reports the error code of a malformed line', () => {
    try {
      decodeRecord('garbage');
      throw new Error('expected decodeRecord to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRecordError);
      expect(error).toMatchObject({ code: 'MALFORMED_RECORD', message: 'Expected 4 fields but found 1' });
    }
  });

  test.each(['abc', '1.5', '', ' 1', '99999999999999999999'])('rejects id %p', (rawId) => {
    expect(() => decodeRecord(`${rawId},0,t,n`)).toThrow(InvalidIdError);
  });

  test.each(['2', '', 'true', '01'])('rejects completed flag %p', (flag) => {
    expect(() => decodeRecord(`1,${flag},t,n`)).toThrow(InvalidCompletedFlagError);
  });

  test('a title ending in a backslash swallows the next delimiter', () => {
    const line = encodeRecord(TaskModel.create(1, 'a\\', 'b'));
    expect(line).toBe('1,0,a\\,b');
    expect(() => decodeRecord(line)).toThrow(MalformedRecordError);
  });
});

describe('round trip', () => {
  const tasks: Task[] = [
    TaskModel.create(1, 'Plain', ''),
    TaskModel.create(2, 'a,b', 'c,,d', true),
    TaskModel.create(3, ',leading and trailing,', ','),
    TaskModel.create(4, 'x\\,y', 'path C:\\dir\\file'),
    TaskModel.create(5, '  spaced  ', 'tabs\tinside', true),
  ];

  test.each(tasks)('preserves task %#', (task) => {
    expect(decodeRecord(encodeRecord(task))).toEqual(task);
  });
});
