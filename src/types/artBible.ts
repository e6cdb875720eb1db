/**
 * Art Bible Types
 *
 * The art bible fixes the book's illustration style; character references fix
 * each character's look. Both are durable inputs from which an image session
 * can always be rebuilt.
 */

export interface ArtBible {
  prompt: string;
  art_style: string;
  image_url?: string;
  local_image_path?: string;
  style_notes?: string;
  color_palette?: string;
  lighting_style?: string;
  brush_technique?: string;
}

export interface CharacterReference {
  character_name: string;
  prompt: string;
  image_url?: string;
  local_image_path?: string;
  species?: string;
  physical_description?: string;
  clothing?: string;
  distinctive_features?: string;
}
