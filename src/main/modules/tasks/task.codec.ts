/**
 * Task record codec
 * Maps a Task to a single line `id,completed,title,notes` and back.
 * Commas inside title/notes are written as `\,`; line breaks become spaces.
 */
import {
  InvalidCompletedFlagError,
  InvalidIdError,
  MalformedRecordError,
} from '../../error/app.error';
import { Task } from '../../../@types/task';
import { TaskModel } from './task.model';

export const FIELD_DELIMITER = ',';
export const ESCAPE_MARKER = '\\';
export const FIELD_COUNT = 4;

const LINE_BREAK_CHARS = /[\r\n]/g;
const DELIMITERS = /,/g;
const INTEGER = /^-?\d+$/;

/**
 * Escape one title/notes field for writing
 */
export function escapeField(value: string): string {
  return value
    .replace(LINE_BREAK_CHARS, ' ')
    .replace(DELIMITERS, ESCAPE_MARKER + FIELD_DELIMITER);
}

/**
 * Split a record line on unescaped delimiters.
 * `\,` becomes a literal comma; any other backslash is kept as is.
 */
export function splitRecord(line: string): string[] {
  const fields: string[] = [];
  let current = '';

  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === ESCAPE_MARKER && line[i + 1] === FIELD_DELIMITER) {
      current += FIELD_DELIMITER;
      i++;
    } else if (c === FIELD_DELIMITER) {
      fields.push(current);
      current = '';
    } else {
      current += c;
    }
  }
  fields.push(current);

  return fields;
}

/**
 * Encode a task as a record line (without the trailing newline)
 */
export function encodeRecord(task: Task): string {
  return [
    String(task.id),
    task.completed ? '1' : '0',
    escapeField(task.title),
    escapeField(task.notes),
  ].join(FIELD_DELIMITER);
}

/**
 * Decode a record line into a task.
 * Fields after the fourth are ignored.
 * @throws MalformedRecordError when the line has fewer than four fields
 * @throws InvalidIdError when the id is not an integer
 * @throws InvalidCompletedFlagError when the completed flag is not 0 or 1
 */
export function decodeRecord(line: string): Task {
  const fields = splitRecord(line);
  if (fields.length < FIELD_COUNT) {
    throw new MalformedRecordError(
      `Expected ${FIELD_COUNT} fields but found ${fields.length}`
    );
  }

  const [rawId, rawCompleted, title, notes] = fields;

  const id = Number(rawId);
  if (!INTEGER.test(rawId) || !Number.isSafeInteger(id)) {
    throw new InvalidIdError(`Invalid task id: "${rawId}"`);
  }

  if (rawCompleted !== '0' && rawCompleted !== '1') {
    throw new InvalidCompletedFlagError(`Invalid completed flag: "${rawCompleted}"`);
  }

  return TaskModel.create(id, title, notes, rawCompleted === '1');
}
