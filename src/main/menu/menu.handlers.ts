/**
 * Menu handlers
 * One handler per menu option, each acting on the task store
 */
import { getLogger } from '../logging';
import { TaskStore } from '../modules/tasks';
import { MENU_OPTIONS, MenuOption } from './menu.options';
import { Prompter } from './menu.io';
import { formatTaskTable } from './task.table';

const logger = getLogger('MenuHandlers');

export type MenuOutcome = 'continue' | 'exit';

export interface MenuContext {
  store: TaskStore;
  prompter: Prompter;
}

export type MenuHandler = (context: MenuContext) => Promise<MenuOutcome>;

/**
 * Ask for a task id, then report whether the action found it
 */
function idAction(
  prompt: string,
  action: (store: TaskStore, id: number) => boolean,
  doneMessage: string
): MenuHandler {
  return async (context) => {
    const { store, prompter } = context;

    const id = await prompter.readInt(prompt);
    if (id === null) return saveAndExit(context);

    prompter.print(action(store, id) ? `${doneMessage}\n\n` : 'Task not found.\n\n');
    return 'continue';
  };
}

/**
 * Save and leave, used both for the Exit option and when input runs out
 */
async function saveAndExit({ store, prompter }: MenuContext): Promise<MenuOutcome> {
  store.save();
  prompter.print('Goodbye.\n');
  return 'exit';
}

export const MENU_HANDLERS: Record<MenuOption, MenuHandler> = {
  [MENU_OPTIONS.LIST]: async ({ store, prompter }) => {
    prompter.print(formatTaskTable(store.listTasks()));
    return 'continue';
  },

  [MENU_OPTIONS.ADD]: async (context) => {
    const { store, prompter } = context;

    let title = await prompter.readLine('Enter title: ');
    while (title === '') {
      prompter.print('Title cannot be empty.\n');
      title = await prompter.readLine('Enter title: ');
    }
    if (title === null) return saveAndExit(context);

    const notes = await prompter.readLine('Enter notes (optional): ');
    if (notes === null) return saveAndExit(context);

    const id = store.addTask(title, notes);
    prompter.print(`Added task with id ${id}.\n\n`);
    return 'continue';
  },

  [MENU_OPTIONS.TOGGLE]: idAction(
    'Enter task id to toggle: ',
    (store, id) => store.toggleComplete(id),
    'Toggled completion.'
  ),

  [MENU_OPTIONS.EDIT]: async (context) => {
    const { store, prompter } = context;

    const id = await prompter.readInt('Enter task id to edit: ');
    if (id === null) return saveAndExit(context);
    const newTitle = await prompter.readLine('New title (leave blank to keep): ');
    if (newTitle === null) return saveAndExit(context);
    const newNotes = await prompter.readLine('New notes (leave blank to keep): ');
    if (newNotes === null) return saveAndExit(context);

    prompter.print(store.editTask(id, newTitle, newNotes) ? 'Edited task.\n\n' : 'Task not found.\n\n');
    return 'continue';
  },

  [MENU_OPTIONS.REMOVE]: idAction(
    'Enter task id to remove: ',
    (store, id) => store.removeById(id),
    'Removed task.'
  ),

  [MENU_OPTIONS.CLEAR]: async (context) => {
    const { store, prompter } = context;

    const answer = await prompter.readLine('Are you sure you want to clear all tasks? [y/N]: ');
    if (answer === null) return saveAndExit(context);

    if (answer.startsWith('y') || answer.startsWith('Y')) {
      store.clearAll();
      prompter.print('All tasks cleared.\n\n');
    } else {
      prompter.print('Canceled.\n\n');
    }
    return 'continue';
  },

  [MENU_OPTIONS.SAVE]: async ({ store, prompter }) => {
    prompter.print(store.save() ? `Saved to ${store.getFilePath()}\n\n` : 'Save failed.\n\n');
    return 'continue';
  },

  [MENU_OPTIONS.LOAD]: async ({ store, prompter }) => {
    prompter.print(store.load() ? `Loaded from ${store.getFilePath()}\n\n` : 'Load failed or no file yet.\n\n');
    return 'continue';
  },

  [MENU_OPTIONS.EXIT]: async (context) => {
    logger.info('Exit chosen from menu');
    return saveAndExit(context);
  },
};
