import type {
  ModelClient,
  ModelPurpose,
  ModelRequest,
} from '../../src/features/agents/model-client';

export type ScriptedReply =
  | string
  | Error
  | ((request: ModelRequest) => string | Promise<string>);

export type Script = Partial<Record<ModelPurpose, ScriptedReply[]>>;

const PURPOSES: ModelPurpose[] = [
  'image_assessment',
  'safety_advice',
  'response_synthesis',
];

/**
 * In-process stand-in for the model service. Replies are consumed in order
 * per purpose; the last one repeats, which keeps retry tests short.
 */
export class ScriptedModelClient implements ModelClient {
  readonly requests: ModelRequest[] = [];
  private readonly queues = new Map<ModelPurpose, ScriptedReply[]>();

  constructor(script: Script = {}) {
    for (const purpose of PURPOSES) {
      const replies = script[purpose];
      if (replies) this.script(purpose, replies);
    }
  }

  script(purpose: ModelPurpose, replies: ScriptedReply[]): this {
    this.queues.set(purpose, [...replies]);
    return this;
  }

  callsFor(purpose: ModelPurpose): ModelRequest[] {
    return this.requests.filter((request) => request.purpose === purpose);
  }

  async generateJson(request: ModelRequest): Promise<string> {
    this.requests.push(request);

    const queue = this.queues.get(request.purpose) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error(`No scripted reply for ${request.purpose}`);
    }
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}
