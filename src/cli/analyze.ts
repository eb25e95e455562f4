import * as dotenv from 'dotenv';
import { createInterface, type Interface } from 'node:readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ffmpegTools } from '../pipeline/chunk';
import { buildEngineChain } from '../pipeline/engines';
import { loadConfig, type PipelineConfig } from '../pipeline/env';
import { MissingCredentialsError, PipelineError, errorMessage } from '../pipeline/errors';
import { toVideoUrl } from '../pipeline/ids';
import { ytdlpSource } from '../pipeline/ingest';
import { AnthropicAnalyzer } from '../pipeline/llm';
import { error as logError, setLogFormat, setLogLevel } from '../pipeline/log';
import {
  CUSTOM_ANALYSIS_PROMPT,
  parsePromptChoice,
  resolvePromptChoice,
  type PromptChoice,
} from '../pipeline/prompts';
import { runPipeline } from '../pipeline/run';
import { diskStore } from '../pipeline/store';

dotenv.config();

const RULE = '='.repeat(50);

async function askPromptChoice(rl: Interface): Promise<PromptChoice> {
  console.log('\nCustom analysis prompt:\n');
  console.log(CUSTOM_ANALYSIS_PROMPT);
  for (;;) {
    const answer = await rl.question('\nUse [c]ustom, [d]efault, or [n]ew prompt? (default: d): ');
    const choice = parsePromptChoice(answer);
    if (choice) return choice;
    console.log('Please answer c, d, or n.');
  }
}

function loadConfigOrExit(): PipelineConfig {
  try {
    return loadConfig();
  } catch (e) {
    if (e instanceof MissingCredentialsError) {
      console.error(`Error: ${e.message}`);
      console.error('Set them in your environment or a .env file, e.g.:');
      for (const name of e.missing) console.error(`  ${name}=your_key`);
      process.exit(1);
    }
    throw e;
  }
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('url', { type: 'string', describe: 'Video URL or ID (prompted for when omitted)' })
    .option('chunks', { type: 'number', describe: 'Number of audio chunks (CHUNK_COUNT)' })
    .option('workers', { type: 'number', describe: 'Concurrent transcription workers (TRANSCRIBE_WORKERS)' })
    .help()
    .parse();

  const config = loadConfigOrExit();
  setLogLevel(config.logLevel);
  setLogFormat(config.logFormat);
  if (argv.chunks !== undefined) config.chunkCount = argv.chunks;
  if (argv.workers !== undefined) config.workers = Math.max(1, Math.floor(argv.workers));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const url = toVideoUrl(argv.url ?? (await rl.question('Enter video URL: ')));
    if (!url) {
      console.error('No URL provided. Exiting.');
      process.exitCode = 1;
      return;
    }

    const choice = await askPromptChoice(rl);
    const entered = choice === 'new' ? await rl.question('Enter your analysis prompt: ') : undefined;
    const prompt = resolvePromptChoice(choice, entered);

    console.log(`\n${RULE}\nProcessing video...\n${RULE}`);
    const result = await runPipeline(url, prompt, {
      config,
      store: diskStore,
      source: ytdlpSource(config),
      tools: ffmpegTools(config),
      engines: buildEngineChain(config),
      analyzer: new AnthropicAnalyzer(config),
      runLog: true,
    });

    console.log(`\n${RULE}\nCompleted!\n${RULE}`);
    console.log(`Workspace:     ${result.workspace.rootPath}`);
    console.log(`Audio:         ${result.audioPath}${result.skipped.download ? ' (cached)' : ''}`);
    console.log(`Transcription: ${result.transcriptPath}${result.skipped.transcription ? ' (cached)' : ''}`);
    console.log(`Analysis:      ${result.response.path}`);

    const show = await rl.question('\nDisplay results? (y/n): ');
    if (show.trim().toLowerCase() === 'y') {
      const t = result.transcript;
      console.log(`\n${'-'.repeat(30)} TRANSCRIPTION ${'-'.repeat(30)}`);
      console.log(t.length > 500 ? `${t.slice(0, 500)}...` : t);
      console.log(`\n${'-'.repeat(30)} ANALYSIS ${'-'.repeat(30)}`);
      console.log(result.response.text);
    }
  } finally {
    rl.close();
  }
}

main().catch((e) => {
  const meta = e instanceof PipelineError ? { name: e.name, ...e.details } : {};
  logError('run.fail', { error: errorMessage(e), ...meta });
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(1);
});
