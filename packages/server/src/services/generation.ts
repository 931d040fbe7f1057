import type { ValidatedLink } from '@metadata-writer/shared';
import type { ReasoningEffort } from '../config/env';
import { METADATA_INSTRUCTIONS } from '../config/prompts';
import type { GenerationRequest } from '../domain/models';
import type { GenerationProtocol, IGenerationBackend, IMetadataGenerator } from '../domain/ports';
import { GenerationFailedError, errorMessage } from '../domain/errors';

export interface GenerationSettings {
  primaryModel: string;
  fallbackModels: readonly string[];
  reasoningEffort: ReasoningEffort;
}

export interface GenerationAttempt {
  model: string;
  protocol: GenerationProtocol;
}

/**
 * Primary first, then each fallback once.
 */
export function buildModelList(primary: string, fallbacks: readonly string[]): string[] {
  const models = [primary.trim(), ...fallbacks.map((model) => model.trim())].filter(Boolean);
  return [...new Set(models)];
}

/**
 * Every (model, protocol) pair in the order they are tried:
 * all models on the preferred protocol, then all models on the alternate one.
 */
export function buildAttemptPlan(models: readonly string[]): GenerationAttempt[] {
  const protocols: GenerationProtocol[] = ['generate', 'stream'];
  return protocols.flatMap((protocol) => models.map((model) => ({ model, protocol })));
}

export function buildUserPayload(request: GenerationRequest): string {
  return (
    `LINKS_MODE: ${request.linkMode}\n\n` +
    `VALIDATED_LINKS:\n${serializeLinks(request.validatedLinks)}\n\n` +
    `TRANSCRIPT:\n${request.transcript}\n`
  );
}

function serializeLinks(links: ValidatedLink[]): string {
  return JSON.stringify(
    links.map(({ url, ok, title, reason }) => ({ url, ok, title, reason })),
    null,
    2
  );
}

export class GenerationClient implements IMetadataGenerator {
  constructor(
    private readonly backend: IGenerationBackend,
    private readonly settings: GenerationSettings
  ) {}

  /**
   * Walks the attempt plan and returns the first usable output.
   * A permission error skips the remaining preferred-protocol attempts.
   */
  public async generate(request: GenerationRequest): Promise<string> {
    const models = buildModelList(this.settings.primaryModel, this.settings.fallbackModels);
    const userPayload = buildUserPayload(request);
    let lastError = 'No models configured.';
    let skipPreferred = false;

    for (const attempt of buildAttemptPlan(models)) {
      if (attempt.protocol === 'generate' && skipPreferred) continue;

      const call = {
        model: attempt.model,
        systemInstruction: METADATA_INSTRUCTIONS,
        userPayload,
        reasoningEffort: this.settings.reasoningEffort
      };

      try {
        console.log(`🧠 Generating metadata with ${attempt.model} (${attempt.protocol})...`);
        const text =
          attempt.protocol === 'generate'
            ? await this.backend.generate(call)
            : await this.backend.stream(call);
        const output = text.trim();

        // An empty answer on the preferred protocol is still returned as is
        if (attempt.protocol === 'generate' || output) return output;
        lastError = `Empty response from ${attempt.model} (stream).`;
      } catch (error) {
        lastError = errorMessage(error);
        console.warn(`⚠️ ${attempt.model} (${attempt.protocol}) failed: ${lastError}`);
        if (attempt.protocol === 'generate' && this.backend.isPermissionError(error)) {
          skipPreferred = true;
        }
      }
    }

    throw new GenerationFailedError(lastError);
  }
}
