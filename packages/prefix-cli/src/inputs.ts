import fs from 'node:fs'; import path from 'node:path'; import { glob } from 'glob';
import { UsageError } from './args.js';

export const INPUT_PATTERN = '**/*.txt';

/**
 * Expand folders into their text files; plain files pass through
 * @returns File paths, folder contents sorted so runs are repeatable
 */
export function expandInputs(inputs: string[], pattern = INPUT_PATTERN): string[] {
  const files: string[] = [];
  for (const input of inputs) {
    if (!fs.existsSync(input)) throw new UsageError(`No such file or folder: ${input}`);
    const st = fs.statSync(input);
    if (st.isDirectory()) {
      const found = glob.sync(pattern, { cwd: input, nodir: true }).sort();
      for (const f of found) files.push(path.join(input, f));
    } else {
      files.push(input);
    }
  }
  return files;
}

/**
 * One string per line, trailing `\r` stripped, in file order. Blank lines are
 * skipped unless `keepBlank` is set, in which case they become empty strings;
 * the newline that ends a file never adds a line.
 */
export function readStrings(files: string[], options: { keepBlank?: boolean } = {}): string[] {
  const { keepBlank = false } = options;
  const strings: string[] = [];
  for (const file of files) {
    const text = fs.readFileSync(file, 'utf8');
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    for (const line of lines) {
      const s = line.endsWith('\r') ? line.slice(0, -1) : line;
      if (keepBlank || s.trim().length > 0) strings.push(s);
    }
  }
  return strings;
}
