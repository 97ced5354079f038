/**
 * Task module index file
 */
import configService from '../../config';
import { TaskModel } from './task.model';
import { TaskStore } from './task.store';

export * from './task.codec';
export { TaskModel, TaskStore };

/**
 * Create a task store for the given file, or the configured one
 */
export function createTaskStore(filePath: string = configService.getTasksFilePath()): TaskStore {
  return new TaskStore(filePath);
}
