export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalizes message text: collapses whitespace, drops a leading
 * "[...]" or "(...)" artefact (usually an inlined timestamp) and a trailing
 * ellipsis
 */
export function cleanMessageText(raw: string): string {
  if (!raw) {
    return '';
  }
  return collapseWhitespace(raw)
    .replace(/^\s*[[(].*?[\])]\s*/, '')
    .replace(/\s*\.\.\.\s*$/, '')
    .trim();
}
