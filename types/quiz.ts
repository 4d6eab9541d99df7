/**
 * Quiz types for the concept lab.
 *
 * A quiz question asks which of four concepts is closest to a prompt.
 * Questions are generated per request and never stored.
 */

import type { ConceptName } from "./concept";

/** A multiple-choice similarity question. */
export interface QuizQuestion {
  /** The concept the player compares the options against. */
  prompt: ConceptName;
  /** Nearest neighbor of the prompt in the index. */
  correctAnswer: ConceptName;
  /** Wrong options, less similar to the prompt than the answer. */
  distractors: ConceptName[];
  /** Correct answer and distractors, shuffled. */
  options: ConceptName[];
}
