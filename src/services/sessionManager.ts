import { SessionStore } from '../repository/sessionStore';
import { ArtBible, CharacterReference } from '../types/artBible';
import { ImageGenerationOptions, ImageGenerationProvider, ImageResult } from '../types/providers';
import { ArtBibleSnapshot, Session, SessionStatus } from '../types/session';
import { CharacterProfile } from '../types/story';
import { SessionNotReadyError, ValidationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { buildPrimingPrompt, CharacterReferenceMap, primedCharacters } from './promptAssembler';
import { toProviderError } from './providers/providerErrors';

type ActiveSession = Session & { sessionId: string; contextInitialized: true };

function isActive(session: Session | undefined): session is ActiveSession {
  return !!session && session.sessionId !== null && session.contextInitialized;
}

export function toReferenceMap(references: readonly CharacterReference[]): CharacterReferenceMap {
  const map: Record<string, string> = {};
  for (const reference of references) {
    const name = reference.character_name.trim();
    const prompt = reference.prompt.trim();
    if (name && prompt) map[name] = prompt;
  }
  return map;
}

function snapshotOf(artBible: ArtBible): ArtBibleSnapshot {
  const imagePath = artBible.local_image_path ?? artBible.image_url;
  return {
    prompt: artBible.prompt,
    artStyle: artBible.art_style,
    ...(imagePath ? { imagePath } : {}),
  };
}

export interface ReferenceUpdate {
  artBible?: ArtBible;
  characterReference?: CharacterReference;
}

/**
 * Owns the per-story image conversation.
 *
 * A story's session is `none`, `partial` (handle present but priming never
 * confirmed) or `active`. Only `active` sessions are used for generation.
 * Initialization and rebuilds run under a per-story lock; reads and
 * generation turns on an active session do not take it.
 */
export class VisualSessionManager {
  constructor(
    private readonly store: SessionStore,
    private readonly provider: ImageGenerationProvider,
    private readonly now: () => number = Date.now
  ) {}

  status(storyId: string): SessionStatus {
    const session = this.store.get(storyId);
    if (!session || session.sessionId === null) {
      return { state: 'none', hasSession: false, contextInitialized: false };
    }
    if (!session.contextInitialized) {
      return { state: 'partial', hasSession: true, contextInitialized: false };
    }
    return { state: 'active', hasSession: true, contextInitialized: true };
  }

  get(storyId: string): Session | undefined {
    return this.store.get(storyId);
  }

  /**
   * The subset of `references` the story's session has actually seen, either
   * at priming or as a sheet generated inside it.
   */
  establishedReferences(storyId: string, references: readonly CharacterReference[]): CharacterReferenceMap {
    const snapshots = this.store.get(storyId)?.characterReferenceSnapshots ?? {};
    const established: Record<string, string> = {};
    for (const [name, prompt] of Object.entries(toReferenceMap(references))) {
      if (snapshots[name] === prompt) established[name] = prompt;
    }
    return established;
  }

  /**
   * Returns the active session id, priming a new conversation first when the
   * story has none. Concurrent callers for one story share a single priming.
   */
  async ensureSession(
    storyId: string,
    artBible: ArtBible,
    characters: readonly CharacterProfile[],
    references: readonly CharacterReference[] = []
  ): Promise<string> {
    assertStoryId(storyId);
    const existing = this.store.get(storyId);
    if (isActive(existing)) return existing.sessionId;

    return this.store.withLock(storyId, async () => {
      const current = this.store.get(storyId);
      if (isActive(current)) return current.sessionId;
      return this.initialize(storyId, artBible, characters, references, current);
    });
  }

  /** Discards whatever the story has and primes a fresh conversation. */
  async rebuild(
    storyId: string,
    artBible: ArtBible,
    characters: readonly CharacterProfile[],
    references: readonly CharacterReference[] = []
  ): Promise<string> {
    assertStoryId(storyId);
    return this.store.withLock(storyId, async () => {
      const current = this.store.get(storyId);
      logger.info({ storyId, previous: current?.sessionId ?? null }, '[Session] Rebuilding session');
      return this.initialize(storyId, artBible, characters, references, current);
    });
  }

  async continueGeneration(
    storyId: string,
    prompt: string,
    options?: ImageGenerationOptions
  ): Promise<ImageResult> {
    const session = this.store.get(storyId);
    if (!isActive(session)) {
      throw new SessionNotReadyError(storyId);
    }
    try {
      return await this.provider.generateInSession(session.sessionId, prompt, options);
    } catch (err) {
      throw toProviderError(this.provider.name, err);
    }
  }

  /**
   * Updates the art-bible or character snapshot after that reference asset was
   * regenerated inside the session. Session identity is unchanged. Returns
   * false when the story has no active session.
   */
  async recordReference(storyId: string, update: ReferenceUpdate): Promise<boolean> {
    return this.store.withLock(storyId, async () => {
      const session = this.store.get(storyId);
      if (!isActive(session)) return false;

      const next: Session = { ...session, updatedAt: this.now() };
      if (update.artBible) next.artBibleSnapshot = snapshotOf(update.artBible);
      if (update.characterReference) {
        const name = update.characterReference.character_name.trim();
        next.characterReferenceSnapshots = {
          ...session.characterReferenceSnapshots,
          [name]: update.characterReference.prompt.trim(),
        };
      }
      this.store.set(next);
      logger.debug({ storyId }, '[Session] Reference snapshot updated');
      return true;
    });
  }

  /**
   * Records a handle restored from elsewhere (e.g. saved before a restart).
   * Priming is unconfirmed, so the story reports `partial` until rebuilt.
   */
  async adopt(storyId: string, sessionId: string): Promise<void> {
    assertStoryId(storyId);
    await this.store.withLock(storyId, async () => {
      this.store.set({
        storyId,
        sessionId,
        contextInitialized: false,
        artBibleSnapshot: null,
        characterReferenceSnapshots: {},
        updatedAt: this.now(),
      });
    });
    logger.warn({ storyId, sessionId }, '[Session] Adopted unconfirmed session; rebuild required');
  }

  async clear(storyId: string): Promise<boolean> {
    return this.store.withLock(storyId, async () => {
      const session = this.store.get(storyId);
      if (!session) return false;
      if (session.sessionId) this.provider.closeSession(session.sessionId);
      this.store.delete(storyId);
      logger.info({ storyId }, '[Session] Cleared session');
      return true;
    });
  }

  /** Forgets every session, as a process restart would. */
  invalidateAll(): number {
    const storyIds = this.store.storyIds();
    for (const storyId of storyIds) {
      const sessionId = this.store.get(storyId)?.sessionId;
      if (sessionId) this.provider.closeSession(sessionId);
    }
    this.store.clear();
    if (storyIds.length) logger.info({ count: storyIds.length }, '[Session] Invalidated all sessions');
    return storyIds.length;
  }

  // Caller must hold the story lock. Commits only after open + prime succeed.
  private async initialize(
    storyId: string,
    artBible: ArtBible,
    characters: readonly CharacterProfile[],
    references: readonly CharacterReference[],
    previous: Session | undefined
  ): Promise<string> {
    const referenceMap = toReferenceMap(references);
    const primingPrompt = buildPrimingPrompt(artBible, characters, referenceMap);
    const primed = primedCharacters(characters, referenceMap);
    const snapshots: Record<string, string> = {};
    for (const character of primed) {
      if (character.name) snapshots[character.name] = character.text;
    }

    let sessionId: string;
    try {
      sessionId = await this.provider.openSession();
    } catch (err) {
      logger.error({ storyId, err }, '[Session] Failed to open provider session');
      throw toProviderError(this.provider.name, err);
    }

    try {
      await this.provider.prime(sessionId, primingPrompt);
    } catch (err) {
      this.provider.closeSession(sessionId);
      logger.error({ storyId, sessionId, err }, '[Session] Priming failed; previous session kept');
      throw toProviderError(this.provider.name, err);
    }

    if (previous?.sessionId && previous.sessionId !== sessionId) {
      this.provider.closeSession(previous.sessionId);
    }
    this.store.set({
      storyId,
      sessionId,
      contextInitialized: true,
      artBibleSnapshot: snapshotOf(artBible),
      characterReferenceSnapshots: snapshots,
      updatedAt: this.now(),
    });
    logger.info(
      { storyId, sessionId, characters: primed.length, references: primed.filter((c) => c.fromReference).length },
      '[Session] Session primed'
    );
    return sessionId;
  }
}

function assertStoryId(storyId: string): void {
  if (!storyId || !storyId.trim()) {
    throw new ValidationError('story_id must be a non-empty string');
  }
}
