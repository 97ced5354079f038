/**
 * Task store
 * Owns the ordered task collection, assigns ids, and loads/saves the task file
 */
import * as fs from 'fs';
import * as path from 'path';
import { handleError, PersistenceNotFoundError, PersistenceReadError, PersistenceWriteError, RecordError, toError } from '../../error';
import { getLogger } from '../../logging';
import { Task } from '../../../@types/task';
import { decodeRecord, encodeRecord } from './task.codec';
import { TaskModel } from './task.model';

const logger = getLogger('TaskStore');

// Only these are stripped around a line; other whitespace belongs to the notes
const LINE_PADDING = /^[ \t\r\n]+|[ \t\r\n]+$/g;

/**
 * Task store class
 *
 * The in-memory collection is the source of truth; the file only changes on
 * `save()` and only replaces memory on `load()`.
 */
export class TaskStore {
  private tasks: Task[] = [];
  private nextId: number = 1;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public getFilePath(): string {
    return this.filePath;
  }

  public get size(): number {
    return this.tasks.length;
  }

  /**
   * Load tasks from the task file, replacing the in-memory collection.
   * Lines that fail to decode are skipped.
   * @returns False if the file is missing or unreadable, leaving memory untouched
   */
  public load(): boolean {
    if (!fs.existsSync(this.filePath)) {
      // Normal on first run, so not reported as an error
      const notFound = new PersistenceNotFoundError(`No task file found at ${this.filePath}, keeping current tasks`);
      logger.info(notFound.message, { code: notFound.code });
      return false;
    }

    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      handleError(new PersistenceReadError(
        `Failed to read tasks from ${this.filePath}: ${toError(error).message}`
      ));
      return false;
    }

    const loaded: Task[] = [];
    const seenIds = new Set<number>();
    let maxSeen = 0;

    content.split('\n').forEach((rawLine, index) => {
      const line = rawLine.replace(LINE_PADDING, '');
      if (line === '') return;

      const task = this.decodeLine(line, index + 1);
      if (!task) return;

      // Hand-edited files may repeat ids; they are kept as found
      if (seenIds.has(task.id)) {
        logger.warn(`Duplicate task id ${task.id} on line ${index + 1} of ${this.filePath}`);
      }
      seenIds.add(task.id);

      loaded.push(task);
      if (task.id > maxSeen) maxSeen = task.id;
    });

    this.tasks = loaded;
    this.nextId = maxSeen + 1;

    logger.info(`Loaded ${loaded.length} tasks from ${this.filePath}`);
    return true;
  }

  /**
   * Save all tasks to the task file, one record per line, overwriting it
   * @returns False if the file could not be written
   */
  public save(): boolean {
    const content = this.tasks.map(task => `${encodeRecord(task)}\n`).join('');

    try {
      // Create directory if it doesn't exist
      const dirPath = path.dirname(this.filePath);
      if (!fs.existsSync(dirPath)) {
        fs.mkdirSync(dirPath, { recursive: true });
      }

      fs.writeFileSync(this.filePath, content, 'utf8');
      logger.info(`Saved ${this.tasks.length} tasks to ${this.filePath}`);
      return true;
    } catch (error) {
      handleError(new PersistenceWriteError(
        `Failed to save tasks to ${this.filePath}: ${toError(error).message}`
      ));
      return false;
    }
  }

  /**
   * Add a new task
   * @param title Task title (emptiness is checked by the caller)
   * @param notes Optional notes
   * @returns The id assigned to the new task
   */
  public addTask(title: string, notes: string = ''): number {
    const task = TaskModel.create(this.nextId++, title, notes, false);
    this.tasks.push(task);

    logger.debug(`Added task ${task.id}: "${title}"`);
    return task.id;
  }

  /**
   * Get a copy of a task by id
   */
  public getTaskById(id: number): Task | undefined {
    const task = this.findTask(id);
    return task ? TaskModel.clone(task) : undefined;
  }

  /**
   * Remove a task, keeping the order of the others
   * @returns True if the task was found
   */
  public removeById(id: number): boolean {
    const index = this.tasks.findIndex(task => task.id === id);
    if (index < 0) {
      logger.debug(`Task with id ${id} not found for removal`);
      return false;
    }

    this.tasks.splice(index, 1);
    logger.debug(`Removed task ${id}`);
    return true;
  }

  /**
   * Flip a task's completion status
   * @returns True if the task was found
   */
  public toggleComplete(id: number): boolean {
    const task = this.findTask(id);
    if (!task) {
      logger.debug(`Task with id ${id} not found for toggle`);
      return false;
    }

    task.completed = !task.completed;
    logger.debug(`Toggled task ${id} to ${task.completed ? 'completed' : 'open'}`);
    return true;
  }

  /**
   * Edit a task. An empty title or notes leaves that field unchanged.
   * @returns True if the task was found
   */
  public editTask(id: number, newTitle: string, newNotes: string): boolean {
    const task = this.findTask(id);
    if (!task) {
      logger.debug(`Task with id ${id} not found for edit`);
      return false;
    }

    if (newTitle !== '') task.title = newTitle;
    if (newNotes !== '') task.notes = newNotes;

    logger.debug(`Edited task ${id}`);
    return true;
  }

  /**
   * List copies of all tasks in their current order
   */
  public listTasks(): readonly Task[] {
    return this.tasks.map(task => TaskModel.clone(task));
  }

  /**
   * Remove every task from memory. The file keeps its contents until `save()`.
   */
  public clearAll(): void {
    logger.info(`Clearing all ${this.tasks.length} tasks`);
    this.tasks = [];
  }

  // Undecodable lines are logged and skipped, never fatal
  private decodeLine(line: string, lineNumber: number): Task | null {
    try {
      return decodeRecord(line);
    } catch (error) {
      if (!(error instanceof RecordError)) throw error;
      logger.warn(`Skipping line ${lineNumber} of ${this.filePath}`, { code: error.code, reason: error.message });
      return null;
    }
  }

  private findTask(id: number): Task | undefined {
    return this.tasks.find(task => task.id === id);
  }
}
