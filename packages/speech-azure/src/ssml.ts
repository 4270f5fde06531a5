/**
 * SSML construction for Azure neural voices.
 */

export interface SsmlOptions {
  readonly language: string;
  readonly voice: string;
  /** Speaking rate multiplier, 1.0 = normal. */
  readonly rate: number;
  /** Pitch shift in percent. */
  readonly pitch: number;
}

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/** Spoken forms for abbreviations the voices misread. */
const EXPANSIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bDr\./g, "Doctor"],
  [/\bDra\./g, "Doctora"],
  [/\bAM\b/g, "A M"],
  [/\bPM\b/g, "P M"],
];

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/**
 * Escape text for SSML and add telephony-friendly pacing:
 * abbreviations are expanded, commas get a 200ms pause and
 * question marks a 250ms pause before them.
 */
export function cleanText(text: string): string {
  let t = escapeXml(text.trim());

  for (const [pattern, spoken] of EXPANSIONS) {
    t = t.replace(pattern, spoken);
  }

  t = t.replaceAll(",", ", <break time='200ms'/>");
  t = t.replaceAll("?", " <break time='250ms'/>?");
  return t;
}

/** Signed percent, e.g. "+2%", "-10%", "+0%". */
export function formatPitch(percent: number): string {
  const rounded = Math.round(percent);
  return `${rounded >= 0 ? "+" : ""}${rounded}%`;
}

/** Build the SSML document for one synthesis call. `text` is raw, unescaped. */
export function buildSsml(text: string, options: SsmlOptions): string {
  return [
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${escapeXml(options.language)}">`,
    `<voice name="${escapeXml(options.voice)}">`,
    `<prosody rate="${options.rate}" pitch="${formatPitch(options.pitch)}">`,
    cleanText(text),
    "</prosody>",
    "</voice>",
    "</speak>",
  ].join("");
}
