/**
 * Prompt Builder
 *
 * Builds the system and user prompts for the news briefing and the quiz
 * briefing from the selected notes. Note contents are added newest first
 * until the token budget runs out.
 */

import type { QuizPattern } from "@study-brief/shared";
import type { NoteRecord } from "../notes/note-record.js";
import { formatDateTime } from "./time-format.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * A partial note section is added only when more than this many tokens remain.
 */
export const MIN_PARTIAL_SECTION_TOKENS = 200;

export const TRUNCATION_NOTE = "[... truncated to fit the context budget]";

export const PATTERN_EMOJI: Readonly<Record<QuizPattern, string>> = {
  learning: "📘",
  review: "📗",
};

const SECTION_SEPARATOR = "\n---\n\n";

// =============================================================================
// Token Estimation
// =============================================================================

/**
 * Rough token count: the larger of a word-based and a character-based guess,
 * so text without spaces (e.g. CJK) is not undercounted.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  const wordBased = Math.floor(words / 0.75);
  const charBased = Math.floor([...text].length * 0.5);
  return Math.max(wordBased, charBased);
}

// =============================================================================
// Note Sections
// =============================================================================

/**
 * Bullet list of notes with their metadata.
 */
export function buildNoteList(notes: readonly NoteRecord[]): string {
  return notes
    .map((note) => {
      const modified = note.modifiedAt ? formatDateTime(note.modifiedAt) : "unknown";
      const lines = [`- **${note.relativePath}** (modified ${modified})`];
      if (note.priority) lines.push(`  priority: ${note.priority}`);
      if (note.deadline) lines.push(`  deadline: ${note.deadline}`);
      if (note.tags.length > 0) lines.push(`  tags: ${note.tags.join(", ")}`);
      if (note.uncheckedCount > 0) lines.push(`  open tasks: ${note.uncheckedCount}`);
      return lines.join("\n");
    })
    .join("\n");
}

/**
 * Note bodies, newest first, within `maxTokens`.
 */
export function buildNoteContents(notes: readonly NoteRecord[], maxTokens: number): string {
  const newestFirst = [...notes].sort(
    (a, b) => (b.modifiedAt?.getTime() ?? -Infinity) - (a.modifiedAt?.getTime() ?? -Infinity)
  );

  const sections: string[] = [];
  let usedTokens = 0;

  for (const note of newestFirst) {
    const section = `### ${note.relativePath}\n\n${note.content}\n`;
    const sectionTokens = estimateTokens(section);

    if (usedTokens + sectionTokens > maxTokens) {
      const remaining = maxTokens - usedTokens;
      if (remaining > MIN_PARTIAL_SECTION_TOKENS) {
        const chars = [...section];
        const keep = Math.floor(chars.length * (remaining / sectionTokens));
        sections.push(`${chars.slice(0, keep).join("")}\n\n${TRUNCATION_NOTE}`);
      }
      break;
    }

    sections.push(section);
    usedTokens += sectionTokens;
  }

  return sections.join(SECTION_SEPARATOR);
}

// =============================================================================
// System Prompts
// =============================================================================

const NEWS_SYSTEM_PROMPT = `You write a personal daily briefing from the user's own Markdown notes.
Find the topics those notes are about, then look up recent news, release notes,
documentation changes and articles on them and summarize what changed.
Cite a source URL for every item.

## Output
- Markdown, in English, with a ## heading per section.
- Leave out sections you have nothing for.
- Keep it short enough to read in five minutes.
`;

const QUIZ_SYSTEM_PROMPT = `You write a short review quiz from the user's own Markdown notes,
taking into account when each note was last modified.

## Quiz
- Exactly one topic per run: Q1 (multiple choice, options A to D) and Q2 (free-form).
- Pattern for this run: **{{pattern}}**
{{instruction}}
- If no note fits this pattern, use the other one.
- Start with a "💡 Key points" recap of the topic, then the two questions.

## topic_key
- Put an HTML comment directly above each topic heading (the ### line):
  \`<!-- topic_key: {relative path}#{section id} -->\`
- {relative path} is the path exactly as given in the note list.
- {section id} is a short lowercase id with letters, digits and hyphens, e.g. \`cache-ttl\`.
- Example: \`<!-- topic_key: networking/dns.md#cache-ttl -->\`

## Output
- Markdown, in English, with a ## heading per section.
- Never include the Q1 answer, its explanation or a model answer for Q2;
  answers are scored after the user replies.
- Keep it short enough to read in five minutes.
`;

const PATTERN_LABELS: Readonly<Record<QuizPattern, string>> = {
  learning: "📘 Active learning",
  review: "📗 Look back",
};

const PATTERN_INSTRUCTIONS: Readonly<Record<QuizPattern, string>> = {
  learning:
    "- Choose a topic from notes modified in the last one or two weeks.\n" +
    "  Aim for applied scenarios and troubleshooting; difficulty moderately high.",
  review:
    "- Choose a topic from notes not modified for over a month.\n" +
    "  Difficulty basic to moderate.",
};

const DISCOVERY_APPENDIX = `
## Discovery run
This run includes notes the user has not looked at in a while.
Favor topics that are new to the briefing or were forgotten.
`;

/**
 * Odd runs quiz recent material, even runs revisit older notes.
 */
export function getQuizPattern(runCount: number): QuizPattern {
  return runCount % 2 === 1 ? "learning" : "review";
}

export function buildNewsSystemPrompt(isDiscovery: boolean): string {
  return NEWS_SYSTEM_PROMPT + (isDiscovery ? DISCOVERY_APPENDIX : "");
}

export function buildQuizSystemPrompt(runCount: number, isDiscovery: boolean): string {
  const pattern = getQuizPattern(runCount);
  const prompt = QUIZ_SYSTEM_PROMPT.replace("{{pattern}}", PATTERN_LABELS[pattern]).replace(
    "{{instruction}}",
    PATTERN_INSTRUCTIONS[pattern]
  );
  return prompt + (isDiscovery ? DISCOVERY_APPENDIX : "");
}

// =============================================================================
// User Prompts
// =============================================================================

export interface UserPromptInput {
  now: Date;
  inputFolders: readonly string[];
  notes: readonly NoteRecord[];
  maxContextTokens: number;
}

function buildContext(input: UserPromptInput): string {
  return [
    "## Run",
    `- Now: ${formatDateTime(input.now)}`,
    `- Folders: ${input.inputFolders.join(", ")}`,
    "",
    "## Notes",
    buildNoteList(input.notes),
    "",
    "## Note contents",
    buildNoteContents(input.notes, input.maxContextTokens),
  ].join("\n");
}

export function buildNewsUserPrompt(input: UserPromptInput): string {
  return `${buildContext(input)}\n\nUsing the notes above, write today's briefing.\n`;
}

export function buildQuizUserPrompt(input: UserPromptInput & { scheduleInfo: string }): string {
  return [
    buildContext(input),
    "",
    "## Spaced repetition",
    input.scheduleInfo,
    "",
    "Using the notes above, write today's review quiz. Prefer topics that are due.",
    "",
  ].join("\n");
}
