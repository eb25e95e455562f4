import path from 'path';
import { appendAnalysis, type AnalysisClient } from './analysis';
import { planChunks, type AudioTools } from './chunk';
import type { EngineStage } from './engines';
import type { PipelineConfig } from './env';
import { TranscriptionFailedError } from './errors';
import { acquireAudio, type VideoSource } from './ingest';
import { closeLogFile, info, setLogFile } from './log';
import { reassemble } from './reassemble';
import type { FileStore } from './store';
import { transcribeAll } from './transcribe';
import type { AnalysisResponse, TranscriptionResult, VideoWorkspace } from './types';
import { resolveWorkspace, transcriptStatus } from './workspace';

export type RunConfig = Pick<
  PipelineConfig,
  'workspacesRoot' | 'chunkCount' | 'workers' | 'boilerplatePhrases'
>;

export interface PipelineDeps {
  config: RunConfig;
  store: FileStore;
  source: VideoSource;
  tools: AudioTools;
  engines: EngineStage[];
  analyzer: AnalysisClient;
  // Mirror logs into <workspace>/run-<epochMs>.log
  runLog?: boolean;
}

export interface PipelineResult {
  title: string;
  workspace: VideoWorkspace;
  audioPath: string;
  transcriptPath: string;
  transcript: string;
  // Empty when the transcript was reused
  chunkResults: TranscriptionResult[];
  response: AnalysisResponse;
  skipped: { download: boolean; transcription: boolean };
}

/**
 * URL -> cached audio -> cached transcript -> a new numbered analysis.
 *
 * Each stage is skipped when its artifact already exists, so a failed run
 * resumes from the last completed stage.
 */
export async function runPipeline(
  url: string,
  prompt: string,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { config, store } = deps;
  const startTs = Date.now();

  const title = await deps.source.fetchTitle(url);
  const ws = await resolveWorkspace(config.workspacesRoot, title, store);
  if (deps.runLog) {
    setLogFile(path.join(ws.rootPath, `run-${startTs}.log`));
  }
  try {
    info('run.start', { url, title, workspace: ws.rootPath });

    const audio = await acquireAudio(ws, url, { source: deps.source, store });

    const cached = await transcriptStatus(ws, store);
    let chunkResults: TranscriptionResult[] = [];
    if (cached.present) {
      info('transcribe.skip', { reason: 'transcript exists', path: cached.path });
    } else {
      const chunks = await planChunks(ws, audio.path, { tools: deps.tools, store }, config.chunkCount);
      chunkResults = await transcribeAll(chunks, deps.engines, { workers: config.workers });
      if (chunkResults.every((r) => r.status === 'failed')) {
        throw new TranscriptionFailedError(
          `All ${chunkResults.length} chunks failed transcription; nothing to analyze`,
          { details: { workspace: ws.rootPath } }
        );
      }
      await reassemble(chunkResults, {
        phrases: config.boilerplatePhrases,
        transcriptPath: cached.path,
        store,
      });
    }

    const transcript = await store.readFile(cached.path);
    const response = await appendAnalysis(ws, prompt, transcript, { analyzer: deps.analyzer, store });

    info('run.complete', {
      workspace: ws.rootPath,
      sequenceNumber: response.sequenceNumber,
      durationMs: Date.now() - startTs,
    });
    return {
      title,
      workspace: ws,
      audioPath: audio.path,
      transcriptPath: cached.path,
      transcript,
      chunkResults,
      response,
      skipped: { download: !audio.downloaded, transcription: cached.present },
    };
  } finally {
    if (deps.runLog) closeLogFile();
  }
}
