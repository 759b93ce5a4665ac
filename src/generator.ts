import { GenerationError } from './errors.ts';
import { logEvent, serializeError } from './logger.ts';
import { normalize } from './matcher.ts';
import { parseRoundPayload } from './payload.ts';
import { buildGenerationRequest } from './prompts.ts';
import { retry } from './retry.ts';
import type { ContentGenerator, RoundConstraints, RoundKind, RoundPayload } from './types.ts';

// drawing a doodle costs more than a text completion
export const RETRY_CEILING: Record<RoundKind, number> = {
  lyric: 12,
  image: 5,
};

export function collides(payload: RoundPayload, constraints: RoundConstraints): boolean {
  const title = normalize(payload.title);
  if (constraints.avoidTitles.has(title)) return true;
  return constraints.previous !== undefined && normalize(constraints.previous.title) === title;
}

export interface RoundSource {
  requestRound(constraints: RoundConstraints): Promise<RoundPayload>;
}

export class RoundGenerator implements RoundSource {
  private readonly content: ContentGenerator;
  private readonly ceilings: Record<RoundKind, number>;

  constructor(content: ContentGenerator, ceilings: Record<RoundKind, number> = RETRY_CEILING) {
    this.content = content;
    this.ceilings = ceilings;
  }

  async requestRound(constraints: RoundConstraints): Promise<RoundPayload> {
    const request = buildGenerationRequest(constraints);
    const ceiling = this.ceilings[constraints.kind];
    let lastValid: RoundPayload | undefined;

    const result = await retry(
      ceiling,
      async (attempt) => {
        let raw: string;
        try {
          raw = await this.content.generate(request);
        } catch (error) {
          throw new GenerationError('Content generator failed', attempt, { cause: error });
        }
        const parsed = parseRoundPayload(constraints.kind, raw);
        if (!parsed.ok) {
          logEvent('warn', 'generator_parse_failed', { attempt, reason: parsed.reason, raw: raw.slice(0, 200) });
          return null;
        }
        lastValid = parsed.payload;
        if (collides(parsed.payload, constraints)) {
          logEvent('info', 'generator_repeat_discarded', { attempt, title: parsed.payload.title });
          return null;
        }
        return parsed.payload;
      },
      (payload) => payload !== null,
    );

    let payload = result.value;
    if (!payload) {
      if (!lastValid) {
        throw new GenerationError(`No usable round after ${result.attempts} attempts`, result.attempts);
      }
      logEvent('warn', 'generator_repeat_accepted', { attempts: result.attempts, title: lastValid.title });
      payload = lastValid;
    }

    if (payload.kind === 'image') {
      return this.drawDoodle(payload, result.attempts);
    }
    return payload;
  }

  private async drawDoodle(payload: RoundPayload, attempts: number): Promise<RoundPayload> {
    try {
      const image = await this.content.generateImage(payload.imagePrompt ?? payload.title);
      return Object.freeze({ ...payload, image });
    } catch (error) {
      logEvent('error', 'generator_image_failed', { error: serializeError(error) });
      throw new GenerationError('Doodle could not be drawn', attempts, { cause: error });
    }
  }
}
