/**
 * `term-raycaster configure`: interactive settings editor
 *
 * Walks through the tunable settings with clack prompts and writes the
 * result to the settings file.
 */

import * as p from '@clack/prompts';
import { readSettingsFile, writeSettingsFile, SETTINGS_FILE } from './config';
import {
  DEFAULT_SETTINGS,
  checkSetting,
  degreesToRadians,
  radiansToDegrees,
  resolveSettings,
  type RaycasterSettings,
} from './raycaster/settings';

interface Question {
  key: keyof RaycasterSettings;
  message: string;
  /** Stored value -> value shown to the user */
  show?: (value: number) => number;
  /** Typed value -> stored value */
  parse?: (value: number) => number;
}

const QUESTIONS: Question[] = [
  { key: 'holdWindowMs', message: 'Key hold window in ms (raise it if movement stutters)' },
  { key: 'moveStep', message: 'Movement per tick (map cells)' },
  { key: 'rotationStep', message: 'Rotation per tick (radians)' },
  { key: 'tiltLimit', message: 'Look up/down limit (rows)' },
  {
    key: 'fov',
    message: 'Field of view (degrees)',
    show: v => Math.round(radiansToDegrees(v)),
    parse: degreesToRadians,
  },
  { key: 'tickIntervalMs', message: 'Tick interval (ms)' },
];

async function ask(question: Question, current: number): Promise<number | null> {
  const show = question.show ?? ((v: number) => v);
  const parse = question.parse ?? ((v: number) => v);

  const answer = await p.text({
    message: question.message,
    initialValue: String(show(current)),
    validate: (value) => {
      const error = checkSetting(question.key, parse(Number(value)));
      return error ?? undefined;
    },
  });
  if (p.isCancel(answer)) return null;
  return parse(Number(answer));
}

export async function configureCommand(): Promise<void> {
  p.intro('term-raycaster');

  const { settings: saved, warnings } = readSettingsFile();
  for (const warning of warnings) {
    p.log.warn(warning);
  }

  const current = resolveSettings(saved);
  const action = await p.select({
    message: 'What would you like to do?',
    options: [
      { value: 'edit', label: 'Edit settings', hint: SETTINGS_FILE },
      { value: 'reset', label: 'Reset to defaults' },
      { value: 'exit', label: 'Exit' },
    ],
  });

  if (p.isCancel(action) || action === 'exit') {
    p.cancel('Cancelled.');
    return;
  }

  if (action === 'reset') {
    writeSettingsFile({});
    p.outro('Settings reset to defaults.');
    return;
  }

  const updated: Partial<RaycasterSettings> = { ...saved };
  for (const question of QUESTIONS) {
    const value = await ask(question, current[question.key]);
    if (value === null) {
      p.cancel('Cancelled. Nothing was saved.');
      return;
    }
    if (value === DEFAULT_SETTINGS[question.key]) {
      delete updated[question.key];
    } else {
      updated[question.key] = value;
    }
  }

  writeSettingsFile(updated);
  p.log.success(`Saved ${SETTINGS_FILE}`);
  p.outro('Run term-raycaster to try it out.');
}
