/**
 * Quiz module — "which concept is closest?" questions.
 *
 * A question shows a prompt concept and four options: its nearest neighbor
 * and three distractors. Distractors come from the middle of the ranking
 * when there is room, skipping the runners-up that would be almost as good
 * an answer as the correct one.
 */

import type { ConceptName, QuizQuestion } from "@/types";
import type { ConceptSnapshot } from "./concepts";
import { QUIZ_DISTRACTORS, QUIZ_MIN_CONCEPTS } from "./config";
import { EmptyInputError } from "./errors";
import { type Rng, randomIndex, shuffle } from "./random";
import { neighborsOf } from "./search";

/** Runners-up passed over before distractors are taken. */
const MAX_SKIPPED_RUNNERS_UP = 2;

/** The concept an answer to `prompt` must name: its nearest neighbor. */
export function correctAnswerFor(snapshot: ConceptSnapshot, prompt: ConceptName): ConceptName {
  const [nearest] = neighborsOf(snapshot, prompt);
  if (!nearest) {
    throw new EmptyInputError(`"${prompt}" has no other concept to compare with`);
  }
  return nearest.concept.name;
}

/**
 * Generate a question from a random prompt.
 * Needs at least QUIZ_MIN_CONCEPTS concepts in the index.
 */
export function nextQuestion(snapshot: ConceptSnapshot, rng: Rng): QuizQuestion {
  if (snapshot.size < QUIZ_MIN_CONCEPTS) {
    throw new EmptyInputError(
      `A quiz needs at least ${QUIZ_MIN_CONCEPTS} concepts, the index holds ${snapshot.size}`,
    );
  }

  const concepts = snapshot.all();
  const prompt = concepts[randomIndex(concepts.length, rng)].name;

  const [nearest, ...rest] = neighborsOf(snapshot, prompt).map((s) => s.concept.name);
  const skip = Math.min(MAX_SKIPPED_RUNNERS_UP, rest.length - QUIZ_DISTRACTORS);
  const distractors = rest.slice(skip, skip + QUIZ_DISTRACTORS);

  return {
    prompt,
    correctAnswer: nearest,
    distractors,
    options: shuffle([nearest, ...distractors], rng),
  };
}

/** Whether `chosen` is the correct answer to `question`. */
export function checkAnswer(question: QuizQuestion, chosen: ConceptName): boolean {
  return chosen === question.correctAnswer;
}
