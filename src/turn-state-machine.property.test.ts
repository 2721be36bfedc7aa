// Property-Based Tests for the Turn State Machine
//
// For any interview and any sequence of answers, driving the pure transitions
// to completion keeps every session invariant, never re-asks a resolved
// question, stays within the follow-up budget and records exactly one answer
// per question, in question order.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  advancePrompt,
  answerForEvaluation,
  applyEvaluation,
  checkInvariants,
  createInitialState,
  receiveAnswer,
  type TurnPolicy,
} from "./turn-state-machine.js";
import { assessKeywords } from "./answer-evaluator.js";
import { SessionPhase, TurnState, type Question, type SessionState } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const VOCABULARY = ["redis", "ttl", "index", "rollback", "postmortem"];

const arbQuestions: fc.Arbitrary<Question[]> = fc
  .array(fc.subarray(VOCABULARY, { maxLength: 3 }), { minLength: 1, maxLength: 4 })
  .map((keywordSets) =>
    keywordSets.map((requiredKeywords, i) => ({
      id: `q${i + 1}`,
      text: `Question ${i + 1}`,
      requiredKeywords,
      guidance: "",
    })),
  );

const arbPolicy: fc.Arbitrary<TurnPolicy> = fc.record({
  maxFollowUpChances: fc.integer({ min: 0, max: 3 }),
  followUpPolicy: fc.constantFrom("per_question" as const, "per_keyword" as const),
});

const arbAnswers = fc.array(
  fc.subarray(VOCABULARY).map((words) => words.join(" ")),
  { minLength: 1, maxLength: 30 },
);

// ─── Driver ─────────────────────────────────────────────────────────────────────

interface Run {
  final: SessionState;
  /** Question index at the time of each prompt. */
  promptedIndexes: number[];
}

function runToCompletion(questions: Question[], policy: TurnPolicy, answers: string[]): Run {
  let state = createInitialState("prop");
  const promptedIndexes: number[] = [];
  let turn = 0;

  for (;;) {
    state = advancePrompt(state, questions);
    if (state.turnState === TurnState.REVIEWING) break;
    promptedIndexes.push(state.questionIndex);

    const evaluating = receiveAnswer(state, answers[turn % answers.length]);
    turn++;
    const assessment = assessKeywords(questions[evaluating.questionIndex], answerForEvaluation(evaluating));
    const next = applyEvaluation(evaluating, questions, { kind: "evaluated", ...assessment }, policy);
    checkInvariants(evaluating, next, questions, policy);
    state = next;

    if (turn > 200) throw new Error("interview did not terminate");
  }
  return { final: state, promptedIndexes };
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("turn state machine properties", () => {
  it("terminates in review with one record per question, in order", () => {
    fc.assert(
      fc.property(arbQuestions, arbPolicy, arbAnswers, (questions, policy, answers) => {
        const { final } = runToCompletion(questions, policy, answers);

        expect(final.phase).toBe(SessionPhase.REVIEWING);
        expect(final.pendingFollowUps).toEqual([]);
        expect(final.answers.map((a) => a.questionId)).toEqual(questions.map((q) => q.id));
      }),
    );
  });

  it("never returns to a resolved question", () => {
    fc.assert(
      fc.property(arbQuestions, arbPolicy, arbAnswers, (questions, policy, answers) => {
        const { promptedIndexes } = runToCompletion(questions, policy, answers);

        for (let i = 1; i < promptedIndexes.length; i++) {
          expect(promptedIndexes[i]).toBeGreaterThanOrEqual(promptedIndexes[i - 1]);
        }
      }),
    );
  });

  it("asks at most 1 + maxFollowUpChances prompts per question under per_question", () => {
    fc.assert(
      fc.property(arbQuestions, fc.integer({ min: 0, max: 3 }), arbAnswers, (questions, max, answers) => {
        const policy: TurnPolicy = { maxFollowUpChances: max, followUpPolicy: "per_question" };
        const { promptedIndexes, final } = runToCompletion(questions, policy, answers);

        questions.forEach((_q, index) => {
          const prompts = promptedIndexes.filter((i) => i === index).length;
          expect(prompts).toBeLessThanOrEqual(1 + max);
          expect(final.answers[index].followUpsAsked).toBe(prompts - 1);
        });
      }),
    );
  });

  it("asks at most 1 + max × keywords prompts per question under per_keyword", () => {
    fc.assert(
      fc.property(arbQuestions, fc.integer({ min: 0, max: 3 }), arbAnswers, (questions, max, answers) => {
        const policy: TurnPolicy = { maxFollowUpChances: max, followUpPolicy: "per_keyword" };
        const { promptedIndexes } = runToCompletion(questions, policy, answers);

        questions.forEach((q, index) => {
          const prompts = promptedIndexes.filter((i) => i === index).length;
          expect(prompts).toBeLessThanOrEqual(1 + max * q.requiredKeywords.length);
        });
      }),
    );
  });

  it("marks a record complete exactly when no required keyword is missing", () => {
    fc.assert(
      fc.property(arbQuestions, arbPolicy, arbAnswers, (questions, policy, answers) => {
        const { final } = runToCompletion(questions, policy, answers);

        for (const record of final.answers) {
          expect(record.status === "complete").toBe(record.missing.length === 0);
        }
      }),
    );
  });
});
