/**
 * CLI entry point for term-raycaster
 *
 * Wires the Node terminal adapter, the settings file and command-line
 * flags into runRaycaster().
 */

import { readFileSync } from 'fs';
import { parseCliArgs, type CliOptions } from './cliArgs';
import { readSettingsFile } from './config';
import { createNodeTerminal } from './nodeTerminal';
import { runRaycaster, type RaycasterOptions } from './raycaster';
import { parseLevel } from './raycaster/grid';
import { createTextureBank, parseTexture } from './raycaster/textures';

function printHelp() {
  console.log(`
  term-raycaster: first-person ASCII raycaster

  Usage:
    term-raycaster                     Run with the built-in room
    term-raycaster --map <file>        Load a map ('#' wall, '.' floor, 'P' start)
    term-raycaster --texture <file>    Load a wall texture (plain or ANSI-colored text)
    term-raycaster --hold <ms>         Key hold window (default 320)
    term-raycaster --fov <degrees>     Field of view (default 60)
    term-raycaster configure           Edit saved settings
    term-raycaster --help              Show this help

  Controls:
    W / S                Forward / back
    A / D                Strafe left / right
    ← / →                Turn
    ↑ / ↓                Look up / down
    Q                    Quit
`);
}

function readLines(path: string): string[] {
  return readFileSync(path, 'utf-8').split('\n');
}

/**
 * Load everything the run needs before touching the terminal, so a bad
 * file fails with a plain error message.
 */
function buildRunOptions(options: CliOptions): RaycasterOptions {
  const { settings: saved, warnings } = readSettingsFile();
  for (const warning of warnings) {
    console.warn(`[Settings] ${warning}`);
  }

  return {
    level: options.mapFile ? parseLevel(readLines(options.mapFile)) : undefined,
    textures: options.textureFile
      ? createTextureBank({ wall: parseTexture(readLines(options.textureFile)) })
      : undefined,
    settings: { ...saved, ...options.settings },
  };
}

function run(options: CliOptions) {
  let runOptions: RaycasterOptions;
  try {
    runOptions = buildRunOptions(options);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  const terminal = createNodeTerminal();
  try {
    runRaycaster(terminal, {
      ...runOptions,
      onExit: (error) => {
        terminal.cleanup();
        if (error) {
          console.error(`term-raycaster: ${error.message}`);
          process.exit(1);
        }
        process.exit(0);
      },
    });
  } catch (err) {
    terminal.cleanup();
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

function main() {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error('Run term-raycaster --help for usage.');
    process.exit(1);
  }

  const { options } = parsed;
  if (options.command === 'help') {
    printHelp();
    return;
  }

  if (options.command === 'configure') {
    import('./configure')
      .then(m => m.configureCommand())
      .catch((err: unknown) => {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      });
    return;
  }

  run(options);
}

main();
