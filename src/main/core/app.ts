/**
 * App Core
 * Wires configuration, the task store and the console menu together
 */
import { getLogger } from '../logging';
import { createTaskStore } from '../modules/tasks';
import { ConsoleMenuIO, runMenu } from '../menu';

const logger = getLogger('AppCore');

/**
 * Register process-wide handlers for errors nothing else caught
 */
function registerProcessHandlers(): void {
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
  });
}

/**
 * Initialize the app and run the menu until the user leaves
 */
export async function initialize(): Promise<void> {
  logger.info('Initializing application');
  registerProcessHandlers();

  const store = createTaskStore();
  // A missing file on first run is expected
  store.load();

  const io = new ConsoleMenuIO();
  try {
    await runMenu(store, io);
  } finally {
    io.close();
    logger.info('Cleanup complete');
  }
}
