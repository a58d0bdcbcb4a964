// src/lib/cli.ts
import type { GuessOptions } from "../types/course";

export const HELP = `Guesses course start and end dates based on activity logs.

Options:
--guessstart           Guess the course start date (default to true)
--guessend             Guess the course end date (default to true)
--guessall             Guess all start and end dates, even if they are already set (default to false)
--update               Update the db or just notify the guess (default to false)
--filter               Analyser dependant. e.g. A courseid would evaluate the model using a single course (Optional)
--tenant               Data directory under DATA_DIR (default to DEFAULT_TENANT)
-h, --help             Print out this help

Example:
$ npm run guess -- --update=1 --filter=123,321
`;

export type CliArgs = {
  help: boolean;
  options: GuessOptions;
  tenant?: string;
  unrecognized: string[];
};

const BOOL_FLAGS = {
  guessstart: "guessStart",
  guessend: "guessEnd",
  guessall: "guessAll",
  update: "update",
} as const;

type BoolFlag = keyof typeof BOOL_FLAGS;
const isBoolFlag = (k: string): k is BoolFlag => Object.prototype.hasOwnProperty.call(BOOL_FLAGS, k);

/** --update=0 / --update=false などは false。値なしは true */
export function parseBool(v: string | undefined): boolean {
  if (v === undefined) return true;
  return !["", "0", "false", "no", "off"].includes(v.trim().toLowerCase());
}

/** 数字とカンマ以外を含む値は空扱い（どのコースにも一致しない） */
export function cleanSequence(v: string): number[] {
  const s = v.trim();
  if (!/^[0-9,]*$/.test(s)) return [];
  return s.split(",").filter(Boolean).map(Number);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const options: GuessOptions = {
    guessStart: true,
    guessEnd: true,
    guessAll: false,
    update: false,
    filter: null,
  };
  let help = false;
  let tenant: string | undefined;
  const unrecognized: string[] = [];

  for (const arg of argv) {
    if (arg === "-h") { help = true; continue; }
    const m = arg.match(/^--([a-z]+)(?:=(.*))?$/);
    if (!m) { unrecognized.push(arg); continue; }
    const [, name, value] = m;

    if (name === "help") help = parseBool(value);
    else if (isBoolFlag(name)) options[BOOL_FLAGS[name]] = parseBool(value);
    else if (name === "filter" && value !== undefined) options.filter = cleanSequence(value);
    else if (name === "tenant" && value) tenant = value;
    else unrecognized.push(arg);
  }

  return { help, options, tenant, unrecognized };
}

/** 3つとも false なら何もすることがない */
export function hasWork(o: GuessOptions): boolean {
  return o.guessStart || o.guessEnd || o.guessAll;
}
