/**
 * Story Types
 *
 * Stories, their pages, and the character data used to keep illustrations
 * consistent from the cover to the last page.
 */

export interface StoryMetadata {
  title: string;
  language: string;
  complexity: string;
  vocabulary_diversity: string;
  age_group: string;
  num_pages: number;
  words_per_page: number;
  genre?: string;
  art_style?: string;
  user_prompt?: string;
}

export interface StoryPage {
  page_number: number;
  text: string;
  image_url?: string;
  image_prompt?: string;
}

export interface Story {
  id: string;
  metadata: StoryMetadata;
  pages: StoryPage[];
  characters: CharacterProfile[];
  created_at: string;
  updated_at: string;
}

/** A character as first identified in the story text. */
export interface Character {
  name: string;
  description: string;
  role?: string;
}

/** Visual profile used in every prompt the character appears in. */
export interface CharacterProfile {
  name: string;
  species: string;
  physical_description: string;
  clothing?: string;
  distinctive_features?: string;
  personality_traits?: string;
}
