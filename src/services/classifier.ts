import path from 'path';
import type { ChunkingConfig, ContentProfileConfig } from '../types/config.js';
import type { ContentType, ContentTypeProfile, Document } from '../types/document.js';

/** Evaluation order; the first matching profile wins. */
export const PROFILE_PRIORITY = ['code', 'table', 'documentation'] as const;

export function buildProfiles(profiles: ChunkingConfig['profiles']): ContentTypeProfile[] {
  return PROFILE_PRIORITY.map((contentType) => toProfile(contentType, profiles[contentType]));
}

function toProfile(contentType: ContentTypeProfile['contentType'], config: ContentProfileConfig): ContentTypeProfile {
  return {
    contentType,
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    minChunkSize: config.minChunkSize,
    maxChunkSize: config.maxChunkSize,
    extensions: new Set(config.extensions.map((ext) => normalizeExtension(ext))),
    patterns: config.patterns,
    patternThreshold: config.patternThreshold,
  };
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function countOccurrences(text: string, pattern: string): number {
  if (pattern.length === 0) return 0;
  let count = 0;
  let from = text.indexOf(pattern);
  while (from !== -1) {
    count++;
    from = text.indexOf(pattern, from + pattern.length);
  }
  return count;
}

/**
 * Picks a content type from a document's origin, then its content.
 */
export class ContentClassifier {
  private profiles: ContentTypeProfile[];

  constructor(profiles: ContentTypeProfile[]) {
    this.profiles = profiles;
  }

  classify(document: Pick<Document, 'content' | 'metadata'>): ContentType {
    const extension = this.extensionOf(document);

    if (extension) {
      for (const profile of this.profiles) {
        if (profile.extensions.has(extension)) {
          return profile.contentType;
        }
      }
    }

    for (const profile of this.profiles) {
      for (const pattern of profile.patterns) {
        if (countOccurrences(document.content, pattern) > profile.patternThreshold) {
          return profile.contentType;
        }
      }
    }

    return 'default';
  }

  getProfile(contentType: ContentType): ContentTypeProfile | undefined {
    return this.profiles.find((profile) => profile.contentType === contentType);
  }

  private extensionOf(document: Pick<Document, 'metadata'>): string | null {
    const { file_type: fileType, source, filename } = document.metadata;
    if (fileType) return normalizeExtension(fileType);
    const name = source ?? filename;
    if (!name) return null;
    const ext = path.extname(name);
    return ext ? ext.toLowerCase() : null;
  }
}
