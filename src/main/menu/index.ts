/**
 * Menu module index file
 */
import { getLogger } from '../logging';
import { TaskStore } from '../modules/tasks';
import { MENU_HANDLERS, MenuContext } from './menu.handlers';
import { CHOICE_PROMPT, isMenuOption, MENU_OPTIONS, MENU_TEXT } from './menu.options';
import { MenuIO, Prompter } from './menu.io';

export * from './menu.options';
export * from './menu.handlers';
export * from './menu.io';
export * from './task.table';

const logger = getLogger('Menu');

/**
 * Run the interactive menu until Exit is chosen or input ends
 */
export async function runMenu(store: TaskStore, io: MenuIO): Promise<void> {
  const prompter = new Prompter(io);
  const context: MenuContext = { store, prompter };

  logger.info('Starting menu');

  for (;;) {
    prompter.print(MENU_TEXT);
    const choice = await prompter.readInt(CHOICE_PROMPT);
    if (choice === null) {
      await MENU_HANDLERS[MENU_OPTIONS.EXIT](context);
      break;
    }
    prompter.print('\n');

    if (!isMenuOption(choice)) {
      prompter.print('Invalid choice.\n\n');
      continue;
    }

    const outcome = await MENU_HANDLERS[choice](context);
    if (outcome === 'exit') break;
  }

  logger.info('Menu finished');
}
