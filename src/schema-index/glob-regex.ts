// Glob to regex translation for catalog file matches.
// Purpose: turn an extension-stripped glob into a regex string the index consumer matches full paths with.
// Assumes consumers test patterns against repository-relative paths with "/" or "\" separators,
// using a regex engine without look-around, so only groups, classes and quantifiers are emitted.

import { Minimatch, type MinimatchOptions } from "minimatch";

const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  noext: true,
  nocomment: true,
  nonegate: true,
  platform: "linux",
};

const GLOBSTAR_SEGMENT = "**";

type TranslatedGlob = { body: string; wildcard: boolean };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Returns null when the glob cannot be compiled.
 *
 * Globs with wildcards become unanchored suffix matches (`<body>\.<ext>$`). Literal globs must
 * match the whole path or start right after a path separator.
 */
export function globToRegex(glob: string, extension: string): string | null {
  const compiled = compileGlob(glob);
  if (!compiled) return null;

  const ext = `\\.${escapeRegExp(extension)}`;
  if (compiled.wildcard) {
    return `${compiled.body}${ext}$`;
  }

  return `^(.*(/|\\\\)${compiled.body}${ext}|${compiled.body}${ext})$`;
}

/** Strips every trailing repeat of `.<extension>`; null when there is none. */
export function stripExtension(glob: string, extension: string): string | null {
  const suffix = `.${extension}`;
  if (!glob.endsWith(suffix)) return null;

  let stripped = glob;
  while (stripped.endsWith(suffix)) {
    stripped = stripped.slice(0, -suffix.length);
  }
  return stripped;
}

// =============================================================================
// COMPILATION
// =============================================================================

function compileGlob(glob: string): TranslatedGlob | null {
  if (glob.trim().length === 0 || !hasBalancedGroups(glob)) return null;

  let globParts: string[][];
  try {
    globParts = new Minimatch(glob, GLOB_OPTIONS).globParts;
  } catch {
    return null;
  }
  if (globParts.length === 0) return null;

  const alternatives: string[] = [];
  let wildcard = false;
  for (const segments of globParts) {
    const translated = translateSegments(segments);
    if (!translated) return null;
    alternatives.push(translated.body);
    wildcard = wildcard || translated.wildcard;
  }

  const body = alternatives.length === 1 ? alternatives[0] : `(?:${alternatives.join("|")})`;
  return { body, wildcard };
}

// Brace expansion leaves unbalanced groups as literal text; treat them as malformed instead.
function hasBalancedGroups(glob: string): boolean {
  let braceDepth = 0;

  for (let i = 0; i < glob.length; i += 1) {
    const char = glob[i];
    if (char === "\\") {
      i += 1;
    } else if (char === "[") {
      const end = findClassEnd(glob, i);
      if (end === -1) return false;
      i = end;
    } else if (char === "{") {
      braceDepth += 1;
    } else if (char === "}") {
      braceDepth -= 1;
      if (braceDepth < 0) return false;
    }
  }

  return braceDepth === 0;
}

function translateSegments(segments: string[]): TranslatedGlob | null {
  let body = "";
  let wildcard = false;

  for (const [index, segment] of segments.entries()) {
    const last = index === segments.length - 1;

    if (segment === GLOBSTAR_SEGMENT) {
      wildcard = true;
      // "a/**" ends in anything; "**/b" and "a/**/b" allow zero or more directories.
      body += last ? ".*" : "(?:.*/)?";
      continue;
    }

    const translated = translateSegment(segment);
    if (translated === null) return null;

    body += translated.body;
    wildcard = wildcard || translated.wildcard;
    if (!last) body += "/";
  }

  return body.length > 0 ? { body, wildcard } : null;
}

function translateSegment(segment: string): TranslatedGlob | null {
  let body = "";
  let wildcard = false;

  for (let i = 0; i < segment.length; i += 1) {
    const char = segment[i];

    if (char === "\\") {
      const next = segment[i + 1];
      body += escapeRegExp(next ?? "\\");
      i += 1;
    } else if (char === "*") {
      while (segment[i + 1] === "*") i += 1;
      body += "[^/]*";
      wildcard = true;
    } else if (char === "?") {
      body += "[^/]";
      wildcard = true;
    } else if (char === "[") {
      const end = findClassEnd(segment, i);
      if (end === -1) return null;
      body += translateClass(segment.slice(i + 1, end));
      wildcard = true;
      i = end;
    } else {
      body += escapeRegExp(char);
    }
  }

  return { body, wildcard };
}

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

// Index of the "]" closing the class opened at `start`, or -1. A "]" right after "[" or "[!" is literal.
function findClassEnd(glob: string, start: number): number {
  let i = start + 1;
  if (glob[i] === "!" || glob[i] === "^") i += 1;
  if (glob[i] === "]") i += 1;

  for (; i < glob.length; i += 1) {
    if (glob[i] === "\\") {
      i += 1;
    } else if (glob[i] === "]") {
      return i;
    }
  }

  return -1;
}

function translateClass(content: string): string {
  let i = 0;
  let negated = false;
  if (content[0] === "!" || content[0] === "^") {
    negated = true;
    i = 1;
  }

  let members = "";
  for (; i < content.length; i += 1) {
    const char = content[i];
    if (char === "\\") {
      members += escapeClassChar(content[i + 1] ?? "\\");
      i += 1;
    } else {
      members += escapeClassChar(char);
    }
  }

  // Negated classes never match the separator, like `?`.
  return negated ? `[^/${members}]` : `[${members}]`;
}

function escapeClassChar(char: string): string {
  return /[\\\]\[^&~]/.test(char) ? `\\${char}` : char;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
