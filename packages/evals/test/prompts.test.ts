import test from "node:test";
import assert from "node:assert/strict";
import { PromptSetValidationError, parsePromptSet, selectPrompts, validatePromptSet } from "../src/prompts.js";

const raw = [
  { id: "code_1", category: "coding", prompt: "Write fizzbuzz", followUps: ["Make it configurable"] },
  { id: "summ_1", category: "summarization", prompt: "Summarize the memo" },
  { id: "code_2", category: "coding", prompt: "Explain recursion" }
];

test("parses a prompt set and keeps follow-ups", () => {
  const prompts = parsePromptSet(raw);
  assert.equal(prompts.length, 3);
  assert.deepEqual(prompts[0], {
    id: "code_1",
    category: "coding",
    prompt: "Write fizzbuzz",
    followUps: ["Make it configurable"]
  });
  assert.equal(prompts[1]?.followUps, undefined);
});

test("reports every invalid entry", () => {
  assert.deepEqual(
    validatePromptSet([
      { id: "a", category: "poetry", prompt: "x" },
      { id: "a", category: "coding", prompt: " ", followUps: [1] },
      "nope"
    ]),
    [
      "prompts[0].category is invalid",
      "prompts[1].id a is duplicated",
      "prompts[1].prompt is required",
      "prompts[1].followUps must be an array of strings",
      "prompts[2] must be an object"
    ]
  );
  assert.throws(() => parsePromptSet({}), PromptSetValidationError);
});

test("selects by category and limit", () => {
  const prompts = parsePromptSet(raw);
  assert.deepEqual(
    selectPrompts(prompts, { category: "coding" }).map((prompt) => prompt.id),
    ["code_1", "code_2"]
  );
  assert.deepEqual(
    selectPrompts(prompts, { limit: 2 }).map((prompt) => prompt.id),
    ["code_1", "summ_1"]
  );
  assert.deepEqual(selectPrompts(prompts, { category: "creative_writing" }), []);
});
