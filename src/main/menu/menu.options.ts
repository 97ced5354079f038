/**
 * Menu options
 * Defines every numbered choice of the interactive menu
 */

export const MENU_OPTIONS = {
  LIST: 1,
  ADD: 2,
  TOGGLE: 3,
  EDIT: 4,
  REMOVE: 5,
  CLEAR: 6,
  SAVE: 7,
  LOAD: 8,
  EXIT: 9
} as const;

export type MenuOption = typeof MENU_OPTIONS[keyof typeof MENU_OPTIONS];

export function isMenuOption(value: number): value is MenuOption {
  return Object.values(MENU_OPTIONS).some(option => option === value);
}

export const MENU_TEXT = [
  '=============================',
  '       To Do List Menu       ',
  '=============================',
  '1. List tasks',
  '2. Add task',
  '3. Toggle complete',
  '4. Edit task',
  '5. Remove task',
  '6. Clear all tasks',
  '7. Save',
  '8. Load',
  '9. Exit',
].map(line => `${line}\n`).join('');

export const CHOICE_PROMPT = 'Choose an option [1-9]: ';
