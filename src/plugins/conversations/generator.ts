import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { TurnGenerator, TurnRequest } from './types.js';

/** Development stand-in: each participant restates the latest line. */
export class LoopbackTurnGenerator implements TurnGenerator {
  constructor(logger?: StructuredLogger) {
    logger?.warn('No turn generator configured; conversations use the loopback generator');
  }

  async generate(request: TurnRequest): Promise<string> {
    const last = request.transcript[request.transcript.length - 1];
    return `${request.participant.name} on "${request.topic}" (turn ${request.turn + 1}): ${last?.content ?? ''}`.trim();
  }
}
