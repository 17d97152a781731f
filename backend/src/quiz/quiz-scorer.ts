/**
 * Quiz Scorer
 *
 * Scores submitted quiz answers with the LLM, applies the spaced-repetition
 * update to each topic and appends a result section to the briefing.
 * Also resolves quizzes left unanswered when the next quiz run starts.
 */

import { readFile, stat } from "node:fs/promises";
import { basename, relative, resolve, isAbsolute } from "node:path";
import { z } from "zod";
import {
  Q2EvaluationSchema,
  type ErrorCode,
  type QuizSubmission,
  type ScoredTopic,
} from "@study-brief/shared";
import type { AppConfig } from "../app-config.js";
import { createLogger } from "../logger.js";
import { errorMessage, isNotFoundError, readFileIfExists } from "../file-utils.js";
import type { StateStore } from "../state-store.js";
import { updateAfterScoring, type PendingQuiz } from "../spaced-repetition/index.js";
import { generateText } from "../briefing/briefing-generator.js";
import { appendQuizResult } from "../briefing/briefing-writer.js";
import { findTopic, type ExtractedTopic } from "../briefing/topic-extractor.js";
import { formatQuizResultSection, type QuizResultItem } from "./result-formatter.js";

const log = createLogger("quiz-scorer");

const BRIEFING_FILE_PATTERN = /^briefing_quiz_.+\.md$/;

const SOURCE_NOT_FOUND = "(Source material not found)";
const QUESTION_NOT_FOUND = "(Question text could not be extracted)";

// =============================================================================
// Errors
// =============================================================================

export class QuizScoringError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "QuizScoringError";
  }
}

// =============================================================================
// Scoring Response
// =============================================================================

/**
 * LLM verdict for one topic. Missing or malformed fields fall back to the
 * least favourable reading.
 */
export const ScoringVerdictSchema = z.object({
  q1Correct: z.boolean().catch(false),
  q1CorrectAnswer: z.string().catch(""),
  q1Explanation: z.string().catch(""),
  q2Evaluation: Q2EvaluationSchema.catch("poor"),
  q2Feedback: z.string().catch(""),
});

export type ScoringVerdict = z.infer<typeof ScoringVerdictSchema>;

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse the scoring reply: the whole text, then a fenced code block, then the
 * widest `{...}` span. Returns null when none of them is a JSON object.
 */
export function parseScoringResponse(text: string): ScoringVerdict | null {
  const candidates = [text.trim()];
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)\n?```/.exec(text);
  if (fenced?.[1]) candidates.push(fenced[1]);
  const braces = /\{[\s\S]*\}/.exec(text);
  if (braces) candidates.push(braces[0]);

  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return ScoringVerdictSchema.parse(parsed);
    }
  }
  return null;
}

// =============================================================================
// Prompts
// =============================================================================

const SCORING_SYSTEM_PROMPT =
  "You are a quiz scoring system. Output only JSON in the requested format, with no other text.";

export interface ScoringPromptInput {
  sourceContent: string;
  q1Text: string;
  q1Choice: string;
  q2Text: string;
  q2Answer: string;
}

export function buildScoringPrompt(input: ScoringPromptInput): string {
  return `Score the following quiz against the source material.

## Source material
${input.sourceContent}

## Q1 (multiple choice)
### Question
${input.q1Text}
### User's choice
${input.q1Choice}

## Q2 (free-form)
### Question
${input.q2Text}
### User's answer
${input.q2Answer}

## Criteria
- Q1: decide correct or incorrect; give the correct option and a short explanation.
- Q2:
  - good: explains the core points correctly
  - partial: on the right track but missing important elements
  - poor: fundamentally wrong, or not an answer

## Output (JSON only)
{
  "q1Correct": true,
  "q1CorrectAnswer": "B",
  "q1Explanation": "...",
  "q2Evaluation": "good|partial|poor",
  "q2Feedback": "..."
}
`;
}

// =============================================================================
// Source Notes
// =============================================================================

/**
 * Read the note a topic key points at (the part before `#`), searching the
 * input folders in order. Paths escaping a folder are ignored.
 */
export async function readSourceNote(
  topicKey: string,
  inputFolders: readonly string[]
): Promise<string | null> {
  const hashAt = topicKey.indexOf("#");
  const relativePath = hashAt === -1 ? topicKey : topicKey.slice(0, hashAt);
  if (!relativePath) {
    return null;
  }

  for (const folder of inputFolders) {
    const root = resolve(folder);
    const candidate = resolve(root, relativePath);
    const rel = relative(root, candidate);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      log.warn(`Topic path escapes ${folder}: ${relativePath}`);
      continue;
    }
    try {
      const content = await readFileIfExists(candidate);
      if (content !== null) {
        return content;
      }
    } catch (error) {
      log.warn(`Failed to read source note ${candidate}: ${errorMessage(error)}`);
      return null;
    }
  }

  log.warn(`Source note not found: ${relativePath}`);
  return null;
}

// =============================================================================
// Scorer
// =============================================================================

export interface QuizScorerOptions {
  store: StateStore;
  config: AppConfig;
  now?: () => Date;
  /** Backoff between LLM attempts; tests pass zeros */
  retryDelaysMs?: readonly number[];
}

export class QuizScorer {
  private readonly store: StateStore;
  private readonly config: AppConfig;
  private readonly now: () => Date;
  private readonly retryDelaysMs: readonly number[] | undefined;

  constructor(options: QuizScorerOptions) {
    this.store = options.store;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.retryDelaysMs = options.retryDelaysMs;
  }

  /**
   * Score every answer of a submission. All topic keys are checked against
   * the briefing before the first LLM call.
   */
  async score(submission: QuizSubmission): Promise<ScoredTopic[]> {
    const briefing = await this.readBriefing(submission.briefingFile);

    const topics = submission.answers.map((answer) => {
      const topic = findTopic(briefing, answer.topicKey);
      if (!topic) {
        throw new QuizScoringError("TOPIC_NOT_FOUND", `Topic not in briefing: ${answer.topicKey}`);
      }
      return topic;
    });

    const scored: ScoredTopic[] = [];
    const items: QuizResultItem[] = [];

    for (const [i, answer] of submission.answers.entries()) {
      const topic = topics[i];
      if (!topic) continue;
      const { result, item } = await this.scoreTopic(topic, answer.q1Choice, answer.q2Answer);
      scored.push(result);
      items.push(item);
    }

    await appendQuizResult(
      submission.briefingFile,
      formatQuizResultSection(items, { now: this.now() })
    );
    return scored;
  }

  private async readBriefing(briefingFile: string): Promise<string> {
    if (!BRIEFING_FILE_PATTERN.test(basename(briefingFile))) {
      throw new QuizScoringError("VALIDATION_ERROR", `Not a quiz briefing: ${briefingFile}`);
    }
    try {
      const stats = await stat(briefingFile);
      if (!stats.isFile()) {
        throw new QuizScoringError("VALIDATION_ERROR", `Not a file: ${briefingFile}`);
      }
      return await readFile(briefingFile, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new QuizScoringError("FILE_NOT_FOUND", `Briefing not found: ${briefingFile}`);
      }
      throw error;
    }
  }

  private async scoreTopic(
    topic: ExtractedTopic,
    q1Choice: string,
    q2Answer: string
  ): Promise<{ result: ScoredTopic; item: QuizResultItem }> {
    log.info(`Scoring ${topic.topicKey}`);

    const sourceContent =
      (await readSourceNote(topic.topicKey, this.config.inputFolders)) ?? SOURCE_NOT_FOUND;

    const generation = await generateText({
      systemPrompt: SCORING_SYSTEM_PROMPT,
      userPrompt: buildScoringPrompt({
        sourceContent,
        q1Text: topic.q1Text || QUESTION_NOT_FOUND,
        q1Choice,
        q2Text: topic.q2Text || QUESTION_NOT_FOUND,
        q2Answer,
      }),
      feature: "quiz",
      model: this.config.llm.model,
      timeoutSeconds: this.config.quiz.scoringTimeoutSeconds,
      retryDelaysMs: this.retryDelaysMs,
      operation: `scoring ${topic.topicKey}`,
    });
    if (!generation.success) {
      throw new QuizScoringError("SDK_ERROR", `Scoring failed: ${generation.error}`);
    }

    const verdict = parseScoringResponse(generation.text);
    if (!verdict) {
      log.error(`Unparsable scoring response: ${generation.text.slice(0, 200)}`);
      throw new QuizScoringError("SCORING_FAILED", "Scoring response was not valid JSON");
    }

    const now = this.now();
    const update = updateAfterScoring(
      this.store,
      topic.topicKey,
      verdict.q1Correct,
      verdict.q2Evaluation,
      this.config.quiz.spacedRepetition,
      now
    );

    const pending = this.store.removePendingQuiz(topic.topicKey);
    const pattern = pending?.pattern ?? topic.pattern;
    this.store.recordQuizResult(
      topic.topicKey,
      {
        date: now.toISOString(),
        q1Correct: verdict.q1Correct,
        q2Evaluation: verdict.q2Evaluation,
        pattern,
      },
      update
    );
    await this.store.save();

    log.info(
      `Scored ${topic.topicKey}: Q1=${verdict.q1Correct}, Q2=${verdict.q2Evaluation}, ` +
        `level ${update.newLevel} (${update.levelChange})`
    );

    return {
      result: {
        topicKey: topic.topicKey,
        q1Correct: verdict.q1Correct,
        q1CorrectAnswer: verdict.q1CorrectAnswer,
        q1Explanation: verdict.q1Explanation,
        q2Evaluation: verdict.q2Evaluation,
        q2Feedback: verdict.q2Feedback,
        newLevel: update.newLevel,
        newIntervalDays: update.newIntervalDays,
        nextQuizAt: update.nextQuizAt,
        levelChange: update.levelChange,
      },
      item: {
        topicKey: topic.topicKey,
        pattern,
        newLevel: update.newLevel,
        levelChange: update.levelChange,
        nextQuizAt: update.nextQuizAt,
        verdict,
      },
    };
  }
}

// =============================================================================
// Unanswered Quizzes
// =============================================================================

/**
 * Record every pending quiz as failed (Q1 incorrect, Q2 poor), append an
 * "unanswered" section to each briefing and clear the pending list.
 * Returns the number of quizzes resolved.
 */
export async function resolveUnansweredQuizzes(
  store: StateStore,
  config: AppConfig,
  now: Date = new Date()
): Promise<number> {
  const pending = store.getPendingQuizzes();
  if (pending.length === 0) {
    return 0;
  }
  log.info(`Resolving ${pending.length} unanswered quiz(zes)`);

  const byBriefing = new Map<string, PendingQuiz[]>();
  for (const quiz of pending) {
    const group = byBriefing.get(quiz.briefingFile) ?? [];
    group.push(quiz);
    byBriefing.set(quiz.briefingFile, group);
  }

  for (const [briefingFile, quizzes] of byBriefing) {
    const items: QuizResultItem[] = quizzes.map((quiz) => {
      const update = updateAfterScoring(
        store,
        quiz.topicKey,
        false,
        "poor",
        config.quiz.spacedRepetition,
        now
      );
      store.recordQuizResult(
        quiz.topicKey,
        { date: now.toISOString(), q1Correct: false, q2Evaluation: "poor", pattern: quiz.pattern },
        update
      );
      return {
        topicKey: quiz.topicKey,
        pattern: quiz.pattern,
        newLevel: update.newLevel,
        levelChange: update.levelChange,
        nextQuizAt: update.nextQuizAt,
      };
    });

    await appendQuizResult(briefingFile, formatQuizResultSection(items, { auto: true, now }));
  }

  store.clearPendingQuizzes();
  await store.save();
  return pending.length;
}
