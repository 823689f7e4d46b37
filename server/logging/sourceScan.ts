import fs from 'node:fs';
import path from 'node:path';

export const SERVER_ROOT = path.resolve(__dirname, '..');

export function listSourceFiles(dir: string = SERVER_ROOT): string[] {
  const out: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listSourceFiles(full));
    else if (entry.isFile() && full.endsWith('.ts') && !full.endsWith('.test.ts')) out.push(full);
  }
  return out;
}

export function relativeToServer(file: string) {
  return path.relative(SERVER_ROOT, file).replace(/\\/g, '/');
}

/** Argument text of every `console.*(...)` call, matched up to the balancing paren. */
export function consoleCallArgs(source: string): string[] {
  const calls: string[] = [];
  const start = /console\.(log|info|warn|error|debug)\s*\(/g;
  let match: RegExpExecArray | null;
  while ((match = start.exec(source))) {
    let depth = 1;
    let i = match.index + match[0].length;
    const from = i;
    for (; i < source.length && depth > 0; i += 1) {
      if (source[i] === '(') depth += 1;
      else if (source[i] === ')') depth -= 1;
    }
    calls.push(source.slice(from, i - 1));
  }
  return calls;
}
