/**
 * Prompt template and rendering tests.
 *
 * Run: node --import tsx --test src/prompts/renderer.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { issueAgendaNode, pillarIntroNode } from "../taxonomy/agenda.js";
import {
  CLASSIFICATION_TEMPLATE,
  DEEP_DIVE_TEMPLATE,
  ISSUE_QUESTION_TEMPLATE,
  PILLAR_INTRO_TEMPLATE,
  SYSTEM_PROMPT,
} from "./library.js";
import { classificationPrompt, deepDiveQuestion, nodeQuestion } from "./questions.js";
import { PromptRenderError, renderPrompt } from "./renderer.js";
import { defineTemplate, extractVariables } from "./template.js";

// ═══════════════════════════════════════════════════════════════════════════
// EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

describe("extractVariables", () => {
  it("returns unique names, sorted", () => {
    assert.deepEqual(extractVariables("{{b}} and {{ a }} then {{b}} and {{node.id}}"), ["a", "b", "node.id"]);
  });

  it("ignores malformed placeholders", () => {
    assert.deepEqual(extractVariables("{{1abc}} {single} {{ }}"), []);
  });

  it("is stable across calls", () => {
    const source = "{{x}}";
    assert.deepEqual(extractVariables(source), ["x"]);
    assert.deepEqual(extractVariables(source), ["x"]);
  });

  it("records variables on defined templates", () => {
    assert.deepEqual(ISSUE_QUESTION_TEMPLATE.variables, ["issue", "issueLower", "pillar"]);
    assert.deepEqual(PILLAR_INTRO_TEMPLATE.variables, ["pillar", "pillarLower"]);
    assert.deepEqual(DEEP_DIVE_TEMPLATE.variables, ["issueLower"]);
    assert.deepEqual(CLASSIFICATION_TEMPLATE.variables, [
      "issueList",
      "pillar",
      "systemPrompt",
      "topic",
      "turnCount",
      "utterance",
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

describe("renderPrompt", () => {
  it("substitutes every occurrence", () => {
    const template = defineTemplate("greeting", "Hi {{name}}, {{ name }} has {{count}} topics.");
    assert.equal(renderPrompt(template, { name: "Sam", count: 3 }), "Hi Sam, Sam has 3 topics.");
  });

  it("accepts raw source strings", () => {
    assert.equal(renderPrompt("{{a}}-{{b}}", { a: "x", b: "y" }), "x-y");
  });

  it("ignores extra variables", () => {
    assert.equal(renderPrompt("{{a}}", { a: "x", unused: "y" }), "x");
  });

  it("keeps empty string values", () => {
    assert.equal(renderPrompt("[{{a}}]", { a: "" }), "[]");
  });

  it("throws with every missing variable", () => {
    const template = defineTemplate("needs-two", "{{first}} {{second}} {{third}}");
    assert.throws(
      () => renderPrompt(template, { second: "ok" }),
      (err: unknown) => {
        assert.ok(err instanceof PromptRenderError);
        assert.equal(err.templateName, "needs-two");
        assert.deepEqual(err.missingVariables, ["first", "third"]);
        assert.equal(err.message, 'Cannot render template "needs-two": missing value(s) for: first, third');
        return true;
      }
    );
  });

  it("does not read inherited properties as values", () => {
    assert.throws(() => renderPrompt("{{toString}}", {}), PromptRenderError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// QUESTIONS
// ═══════════════════════════════════════════════════════════════════════════

describe("agenda questions", () => {
  it("asks a broad question at a pillar intro", () => {
    assert.equal(
      nodeQuestion(pillarIntroNode("Environmental")),
      "Let's talk about **Environmental** topics.\n\n" +
        "When you think about environmental issues, what matters most to you in your investments? " +
        "Feel free to mention any specific concerns."
    );
  });

  it("asks about one issue at an issue node", () => {
    assert.equal(
      nodeQuestion(issueAgendaNode("Environmental", "Water Management")),
      "Let's look at **Water Management** (Environmental).\n\n" +
        "How important is water management in your investment decisions, " +
        "and is there anything about it you particularly care about?"
    );
  });

  it("words the deep dive around the issue", () => {
    assert.equal(
      deepDiveQuestion(issueAgendaNode("Social", "Diversity & Inclusion")),
      "Since diversity & inclusion clearly matters to you, which specific aspects are most important? " +
        "For example, particular practices or outcomes you'd want companies to report on."
    );
  });
});

describe("classificationPrompt", () => {
  const prompt = classificationPrompt({
    node: issueAgendaNode("Environmental", "Water Management"),
    utterance: "I worry about rivers",
    issues: ["Climate Exposure", "Water Management"],
    turnCount: 2,
  });

  it("starts with the system prompt", () => {
    assert.ok(prompt.startsWith(SYSTEM_PROMPT));
  });

  it("names the topic, the pillar's issues and the utterance", () => {
    const lines = prompt.split("\n");
    assert.ok(lines.includes("Current topic: Water Management (Environmental)"));
    assert.ok(lines.includes("Turns spent on this topic: 2"));
    assert.ok(lines.includes("Issues within Environmental: Climate Exposure, Water Management"));
    assert.ok(lines.includes('The user said: "I worry about rivers"'));
  });

  it("asks for the tagged reply format", () => {
    const lines = prompt.split("\n");
    assert.equal(lines.at(-4), "INTEREST_LEVEL: HIGH | MEDIUM | LOW | UNCERTAIN");
    assert.equal(lines.at(-3), "SUGGESTED_ACTION: CONTINUE | NEXT_ISSUE | SKIP_PILLAR");
    assert.equal(lines.at(-2), "MENTIONED_ISSUES: <comma-separated issue names or NONE>");
    assert.equal(lines.at(-1), "RESPONSE: <your reply to the user>");
  });

  it("says NONE when the pillar has no issues", () => {
    const bare = classificationPrompt({
      node: pillarIntroNode("Governance"),
      utterance: "hello",
      issues: [],
      turnCount: 1,
    });
    assert.ok(bare.split("\n").includes("Issues within Governance: NONE"));
  });
});
