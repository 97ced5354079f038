/**
 * Task model
 * Defines the data structure for a Task item
 */
import { Task } from '../../../@types/task';

/**
 * Task model with methods for creation and copying
 */
export class TaskModel {
  /**
   * Create a new Task object
   * @param id Store-assigned id
   * @param title Title of the task
   * @param notes Optional notes
   * @param completed Whether the task is completed
   */
  public static create(
    id: number,
    title: string,
    notes: string = '',
    completed: boolean = false
  ): Task {
    return { id, title, notes, completed };
  }

  /**
   * Copy a task so the store never shares its own objects
   */
  public static clone(task: Task): Task {
    return TaskModel.create(task.id, task.title, task.notes, task.completed);
  }
}
