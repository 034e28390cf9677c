/**
 * In-process stand-ins for the text and image backends
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type {
  IEditableImageService,
  IGenerateOnlyImageService,
  ITextGenerationService,
} from '@/ai/interfaces.js';
import type { PipelineEvent, PipelineObserver } from '@/services/pipeline-events.js';
import type { StoryConfig } from '@/shared/types.js';
import { delay } from '@/shared/utils.js';

export class FakeTextService implements ITextGenerationService {
  public readonly provider = 'fake-text';
  public readonly model = 'fake-text-model';
  public readonly prompts: string[] = [];

  constructor(private readonly result: string | Error) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

export interface ImageCall {
  mode: 'generate' | 'edit';
  pageNumber: number;
  prompt: string;
  outputPath: string;
  inputImagePaths: readonly string[];
}

export interface FakeImageBehaviour {
  /** Page numbers whose call resolves to null */
  failPages?: number[];
  /** Page numbers whose call throws */
  throwPages?: number[];
  /** Milliseconds to wait before answering, per page */
  delays?: Record<number, number>;
}

function pageNumberOf(outputPath: string): number {
  const match = /page_(\d+)/.exec(path.basename(outputPath));
  return match ? Number(match[1]) : 0;
}

abstract class FakeImageBackend {
  public readonly provider = 'fake-image';
  public readonly calls: ImageCall[] = [];
  public readonly completionOrder: number[] = [];
  public inFlight = 0;
  public maxInFlight = 0;

  constructor(protected readonly behaviour: FakeImageBehaviour = {}) {}

  async generate(prompt: string, outputPath: string): Promise<string | null> {
    return this.respond({ mode: 'generate', prompt, outputPath, inputImagePaths: [] });
  }

  protected async respond(call: Omit<ImageCall, 'pageNumber'>): Promise<string | null> {
    const pageNumber = pageNumberOf(call.outputPath);
    this.calls.push({ ...call, pageNumber });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await delay(this.behaviour.delays?.[pageNumber] ?? 0);
      if (this.behaviour.throwPages?.includes(pageNumber)) {
        throw new Error(`backend exploded on page ${pageNumber}`);
      }
      if (this.behaviour.failPages?.includes(pageNumber)) {
        return null;
      }
      await mkdir(path.dirname(call.outputPath), { recursive: true });
      await writeFile(call.outputPath, `image for page ${pageNumber}`);
      return call.outputPath;
    } finally {
      this.inFlight -= 1;
      this.completionOrder.push(pageNumber);
    }
  }
}

export class FakeEditableImageService extends FakeImageBackend implements IEditableImageService {
  public readonly model = 'fake-editable';
  public readonly supportsEdit = true;

  async edit(prompt: string, inputImagePaths: readonly string[], outputPath: string): Promise<string | null> {
    return this.respond({ mode: 'edit', prompt, outputPath, inputImagePaths });
  }
}

export class FakeGenerateOnlyImageService extends FakeImageBackend implements IGenerateOnlyImageService {
  public readonly model = 'fake-generate-only';
  public readonly supportsEdit = false;
}

export function recordingObserver(): { observer: PipelineObserver; events: PipelineEvent[] } {
  const events: PipelineEvent[] = [];
  return { observer: (event) => events.push(event), events };
}

export function eventsOfType<T extends PipelineEvent['type']>(
  events: readonly PipelineEvent[],
  type: T,
): Extract<PipelineEvent, { type: T }>[] {
  return events.filter((e): e is Extract<PipelineEvent, { type: T }> => e.type === type);
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'storybook-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function buildStoryConfig(overrides: Partial<StoryConfig> = {}): StoryConfig {
  return {
    characters: [
      { name: 'Luna', description: 'a curious girl with a red scarf' },
      { name: 'Max', description: 'a friendly brown dog' },
    ],
    theme: 'friendship',
    ageRange: '4-6',
    location: { setting: 'a quiet village by a lake', details: ['an old oak tree', 'a wooden bridge'] },
    storyLengthPages: 4,
    imageStyle: 'soft watercolor',
    ...overrides,
  };
}
