import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { isLogLevel, levelOrder, type LogLevel } from '../pipeline/log';
import { workspaceFor } from '../pipeline/workspace';

function tailFile(file: string, from: number) {
  let size = from;
  setInterval(() => {
    try {
      const stat = fs.statSync(file);
      if (stat.size > size) {
        const stream = fs.createReadStream(file, { start: size, end: stat.size - 1 });
        stream.on('data', (buf) => process.stdout.write(buf));
        size = stat.size;
      }
    } catch (e) {
      console.error('Failed to read', file, e);
    }
  }, 1500);
}

function latestRunLog(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^run-\d+\.log$/.test(f))
    .sort((a, b) => Number(a.slice(4, -4)) - Number(b.slice(4, -4)));
  const last = candidates[candidates.length - 1];
  return last ? path.join(dir, last) : null;
}

/**
 * Keep structured lines at or above `min`; unparseable lines pass through.
 */
function filterLine(line: string, min: LogLevel): string | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
  if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && typeof parsed.level === 'string') {
    const level = parsed.level;
    if (isLogLevel(level) && levelOrder(level) < levelOrder(min)) return null;
  }
  return trimmed;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('title', { type: 'string', describe: 'Video title whose latest run log to show' })
    .option('root', { type: 'string', default: process.env.WORKSPACES_ROOT || 'workspaces' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => Boolean(a.title || a.file) || 'Provide --title or --file')
    .parse();

  let file = argv.file ?? null;
  if (!file && argv.title) {
    const ws = workspaceFor(argv.root, argv.title);
    file = latestRunLog(ws.rootPath);
    if (!file) {
      console.error('No run-*.log found in', ws.rootPath);
      process.exit(1);
    }
  }
  if (!file || !fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min: LogLevel = isLogLevel(argv.level) ? argv.level : 'debug';

  const content = fs.readFileSync(file, 'utf8').split(/\r?\n/);
  for (const line of content) {
    const out = filterLine(line, min);
    if (out !== null) process.stdout.write(out + '\n');
  }
  if (argv.follow) {
    tailFile(file, fs.statSync(file).size);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
