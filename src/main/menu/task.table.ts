/**
 * Task table
 * Renders the task list as fixed-width columns
 */
import { Task } from '../../@types/task';

const ID_WIDTH = 6;
const STATUS_WIDTH = 12;
const TITLE_WIDTH = 30;
const RULE_WIDTH = 75;

export function formatTaskTable(tasks: readonly Task[]): string {
  if (tasks.length === 0) {
    return 'No tasks found.\n';
  }

  const header = 'ID'.padEnd(ID_WIDTH) + 'Status'.padEnd(STATUS_WIDTH) + 'Title'.padEnd(TITLE_WIDTH) + 'Notes';
  const rows = tasks.map(task =>
    String(task.id).padEnd(ID_WIDTH) +
    (task.completed ? 'Complete' : 'Open').padEnd(STATUS_WIDTH) +
    task.title.padEnd(TITLE_WIDTH) +
    task.notes
  );

  return ['', header, '='.repeat(RULE_WIDTH), ...rows, '', ''].join('\n');
}
