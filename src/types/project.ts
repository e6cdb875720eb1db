import { ArtBible, CharacterReference } from './artBible';
import { CharacterProfile, Story } from './story';

export type ProjectStatus =
  | 'draft'
  | 'story_generated'
  | 'prompts_generated'
  | 'images_generated'
  | 'completed';

export interface Project {
  id: string;
  name: string;
  status: ProjectStatus;
  story: Story;
  characterProfiles: CharacterProfile[];
  artBible?: ArtBible;
  characterReferences: CharacterReference[];
  createdAt: string;
  updatedAt: string;
}
