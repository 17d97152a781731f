/**
 * Topic Extractor
 *
 * Reads the `<!-- topic_key: path#section -->` markers the quiz briefing
 * places above each topic heading, with the topic's question texts.
 */

import type { QuizPattern } from "@study-brief/shared";
import { PATTERN_EMOJI } from "./prompt-builder.js";

export interface ExtractedTopic {
  topicKey: string;
  title: string;
  pattern: QuizPattern;
  /** Multiple-choice question, without its options */
  q1Text: string;
  /** Free-form question */
  q2Text: string;
}

// =============================================================================
// Patterns
// =============================================================================

const TOPIC_MARKER = /<!--\s*topic_key:\s*(.+?)\s*-->\s*\n\s*###\s*(.+)/g;

/** Markers above Q1/Q2 headings belong to the enclosing topic */
const QUESTION_TITLE = /^Q[12]\b/;

const RESULTS_HEADING = /^## 📝 Quiz Results/m;

const Q1_TEXT = /(?:#{1,4}\s+|\*\*)?Q1[^\n]*\n+([\s\S]+?)(?=\n-\s*A\)|\n\*\*A[.)]|\n---)/;

const Q2_TEXT = /(?:#{1,4}\s+|\*\*)?Q2[^\n]*\n+([\s\S]+?)(?=\n---|$)/;

function stripQuotes(text: string): string {
  return text.replace(/^>\s?/gm, "").trim();
}

function matchQuestion(block: string, pattern: RegExp): string {
  const match = pattern.exec(block);
  return match?.[1] ? stripQuotes(match[1].trim()) : "";
}

/**
 * Pattern from the last 📘 or 📗 before `position`; learning when neither.
 */
function patternBefore(content: string, position: number): QuizPattern {
  const preceding = content.slice(0, position);
  const learningAt = preceding.lastIndexOf(PATTERN_EMOJI.learning);
  const reviewAt = preceding.lastIndexOf(PATTERN_EMOJI.review);
  return reviewAt > learningAt ? "review" : "learning";
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Topics in document order. A repeated topic key keeps its first block.
 */
export function extractTopics(markdown: string): ExtractedTopic[] {
  const markers = [...markdown.matchAll(TOPIC_MARKER)].filter(
    (match) => !QUESTION_TITLE.test(match[2]?.trim() ?? "")
  );

  const topics: ExtractedTopic[] = [];
  const seen = new Set<string>();

  markers.forEach((match, i) => {
    const start = match.index ?? 0;
    const topicKey = match[1]?.trim() ?? "";
    if (!topicKey || seen.has(topicKey)) {
      return;
    }
    seen.add(topicKey);

    const next = markers[i + 1];
    let block = markdown.slice(start, next?.index ?? markdown.length);
    const results = RESULTS_HEADING.exec(block);
    if (results) {
      block = block.slice(0, results.index);
    }

    topics.push({
      topicKey,
      title: match[2]?.trim() ?? "",
      pattern: patternBefore(markdown, start),
      q1Text: matchQuestion(block, Q1_TEXT),
      q2Text: matchQuestion(block, Q2_TEXT),
    });
  });

  return topics;
}

/**
 * Question texts for one topic, or null when the briefing has no such topic.
 */
export function findTopic(markdown: string, topicKey: string): ExtractedTopic | null {
  return extractTopics(markdown).find((topic) => topic.topicKey === topicKey) ?? null;
}

/**
 * Short display title for a topic key: the section id after `#`.
 */
export function topicTitleFromKey(topicKey: string): string {
  const hashAt = topicKey.lastIndexOf("#");
  return hashAt === -1 ? topicKey : topicKey.slice(hashAt + 1);
}
