/**
 * none    - no provider conversation for the story
 * partial - a handle exists but priming was never confirmed; must be rebuilt
 * active  - handle present and primed with the art bible and characters
 */
export type SessionState = 'none' | 'partial' | 'active';

export interface ArtBibleSnapshot {
  prompt: string;
  artStyle: string;
  imagePath?: string;
}

export interface Session {
  storyId: string;
  sessionId: string | null;
  contextInitialized: boolean;
  artBibleSnapshot: ArtBibleSnapshot | null;
  // character name -> text that primed it: the reference prompt, else the profile description
  characterReferenceSnapshots: Record<string, string>;
  updatedAt: number;
}

export interface SessionStatus {
  state: SessionState;
  hasSession: boolean;
  contextInitialized: boolean;
}
