const TAG = /<(\/?)([A-Za-z][\w-]*)[^<>]*?(\/?)>/g;

export type MarkupCheck =
  | { ok: true; text: string }
  | { ok: false; reason: string };

/**
 * Strip inline markup from statement text. Tags must be balanced and may not
 * nest; anything else marks the statement as malformed.
 */
export function stripMarkup(text: string): MarkupCheck {
  let open: string | null = null;

  for (const match of text.matchAll(TAG)) {
    const [, closing, name, selfClosing] = match;
    if (selfClosing) continue;

    if (closing) {
      if (open !== name) {
        return { ok: false, reason: `unexpected closing tag </${name}>` };
      }
      open = null;
    } else {
      if (open !== null) {
        return { ok: false, reason: `nested tag <${name}> inside <${open}>` };
      }
      open = name;
    }
  }

  if (open !== null) {
    return { ok: false, reason: `unclosed tag <${open}>` };
  }

  const stripped = text.replace(TAG, " ");
  if (/[<>]/.test(stripped)) {
    return { ok: false, reason: "stray angle bracket" };
  }

  return { ok: true, text: stripped.replace(/\s+/g, " ").trim() };
}
