/**
 * Page Image Planner
 * Decides how one page gets illustrated: the prompt, the reference images and
 * whether the backend is asked to generate from scratch or edit references.
 */

import { stat } from 'fs/promises';
import type { IImageGenerationService } from '@/ai/interfaces.js';
import type { Character, ImageRequest, StoryConfig } from '@/shared/types.js';
import { findMentions, formatCharacterDetails } from './mentions.js';
import { noopObserver, type PipelineObserver } from './pipeline-events.js';
import { PromptService } from './prompt.js';

export interface PlanPageImageInput {
  pageText: string;
  pageNumber: number;
  /** Every page's text, in order; sent as story context */
  pageTexts: readonly string[];
  config: StoryConfig;
  /** null when no image backend is configured */
  imageService: IImageGenerationService | null;
  observer?: PipelineObserver;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Reference image paths of the given characters that exist on disk.
 * Missing files are reported and skipped.
 */
export async function resolveReferenceImages(
  characters: readonly Character[],
  pageNumber: number,
  observer: PipelineObserver = noopObserver,
): Promise<string[]> {
  const references: string[] = [];
  for (const character of characters) {
    if (!character.imagePath) continue;
    if (await isFile(character.imagePath)) {
      references.push(character.imagePath);
    } else {
      observer({
        type: 'page.reference-missing',
        pageNumber,
        character: character.name,
        imagePath: character.imagePath,
      });
    }
  }
  return references;
}

export async function buildBasePrompt(
  pageText: string,
  pageTexts: readonly string[],
  config: StoryConfig,
  characterDetails: string,
): Promise<string> {
  const template = await PromptService.loadPrompt('page-image');
  return PromptService.processPrompt(template.userPrompt, {
    imageStyle: config.imageStyle,
    setting: config.location.setting,
    theme: config.theme,
    ageRange: config.ageRange,
    storyContext: pageTexts.join(' '),
    pageText,
    characterDetails,
  });
}

export async function planPageImage(input: PlanPageImageInput): Promise<ImageRequest> {
  const { pageText, pageNumber, pageTexts, config, imageService } = input;
  const observer = input.observer ?? noopObserver;

  const mentioned = findMentions(pageText, config.characters);
  const characterDetails = formatCharacterDetails(mentioned);
  observer({ type: 'page.mentions', pageNumber, characters: mentioned.map((c) => c.name) });

  const basePrompt = await buildBasePrompt(pageText, pageTexts, config, characterDetails);
  const referenceImages = await resolveReferenceImages(mentioned, pageNumber, observer);

  if (referenceImages.length > 0 && imageService?.supportsEdit) {
    const editTemplate = await PromptService.loadPrompt('page-image-edit');
    const editInstruction = PromptService.processPrompt(editTemplate.userPrompt, { characterDetails });
    return {
      mode: 'edit',
      prompt: `${basePrompt} ${editInstruction}`,
      referenceImages,
      mentioned,
    };
  }

  if (referenceImages.length > 0 && imageService) {
    observer({
      type: 'page.capability-mismatch',
      pageNumber,
      referenceCount: referenceImages.length,
      provider: `${imageService.provider}/${imageService.model}`,
    });
  }

  return { mode: 'generate', prompt: basePrompt, referenceImages: [], mentioned };
}
