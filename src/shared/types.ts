// -----------------------------------------------------------------------------
// Storybook domain types
// -----------------------------------------------------------------------------

export interface Character {
  readonly name: string;
  readonly description: string;
  readonly imagePath?: string;
}

export interface Location {
  readonly setting: string;
  readonly details: readonly string[];
}

export interface StoryConfig {
  readonly characters: readonly Character[];
  readonly theme: string;
  readonly ageRange: string;
  readonly location: Location;
  readonly storyLengthPages: number;
  readonly imageStyle: string;
}

export interface Page {
  /** 1-based, contiguous within a book */
  readonly pageNumber: number;
  readonly text: string;
  readonly imagePath: string | null;
  /** Prompt sent to the image backend, kept even when the image failed */
  readonly imagePrompt: string | null;
}

export interface Book {
  readonly title: string;
  readonly config: StoryConfig;
  readonly fullStory: string;
  readonly outputDir: string;
  /** Sorted ascending by pageNumber */
  readonly pages: readonly Page[];
}

export type ImageMode = 'generate' | 'edit';

export interface ImageRequest {
  readonly mode: ImageMode;
  readonly prompt: string;
  readonly referenceImages: readonly string[];
  readonly mentioned: readonly Character[];
}
