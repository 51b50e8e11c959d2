/**
 * term-raycaster
 *
 * First-person ASCII raycaster for xterm.js and the terminal.
 *
 * Library usage (xterm.js):
 *   import { runRaycaster } from 'term-raycaster';
 *   const controller = runRaycaster(terminal, { onExit: () => console.log('bye') });
 *
 * CLI usage:
 *   term-raycaster --map room.txt
 */

export * from './raycaster';
