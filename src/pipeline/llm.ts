import Anthropic from '@anthropic-ai/sdk';
import type { AnalysisClient } from './analysis';
import type { PipelineConfig } from './env';
import { AnalysisServiceError } from './errors';
import { info } from './log';
import { ANALYST_SYSTEM_PROMPT, buildAnalysisMessage } from './prompts';

type AnalyzerConfig = Pick<
  PipelineConfig,
  'anthropicApiKey' | 'analysisModel' | 'analysisMaxTokens' | 'analysisTemperature' | 'requestTimeoutMs'
>;

export class AnthropicAnalyzer implements AnalysisClient {
  private client: Anthropic;
  private cfg: AnalyzerConfig;

  constructor(cfg: AnalyzerConfig) {
    this.cfg = cfg;
    // Failed analyses are reported, not retried
    this.client = new Anthropic({ apiKey: cfg.anthropicApiKey, timeout: cfg.requestTimeoutMs, maxRetries: 0 });
  }

  async analyze(prompt: string, transcript: string): Promise<string> {
    info('llm.request', { model: this.cfg.analysisModel, chars: transcript.length });
    try {
      const message = await this.client.messages.create({
        model: this.cfg.analysisModel,
        max_tokens: this.cfg.analysisMaxTokens,
        temperature: this.cfg.analysisTemperature,
        system: ANALYST_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildAnalysisMessage(prompt, transcript) }],
      });
      const text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      if (!text.trim()) {
        throw new AnalysisServiceError(`Model returned no text (stop_reason=${message.stop_reason})`);
      }
      return text;
    } catch (e) {
      if (e instanceof Anthropic.APIError) {
        throw new AnalysisServiceError(`Anthropic request failed: ${e.message}`, e.status, { cause: e });
      }
      throw e;
    }
  }
}
