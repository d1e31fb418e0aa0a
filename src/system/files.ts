import {readFile} from 'fs/promises';
import {InvalidInputError} from '../game/errors';

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Reads a UTF-8 text file the user pointed us at.
 *
 * @throws InvalidInputError if the file can't be read.
 */
export async function readTextFile(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (e: unknown) {
    throw new InvalidInputError(`Cannot read ${file}: ${messageOf(e)}`);
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @throws InvalidInputError if the file can't be read or isn't JSON.
 */
export async function readJsonFile(file: string): Promise<unknown> {
  const text = await readTextFile(file);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e: unknown) {
    throw new InvalidInputError(`${file} is not valid JSON: ${messageOf(e)}`);
  }
}
