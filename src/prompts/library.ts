/**
 * Built-in prompt and message templates.
 */

import { defineTemplate } from "./template.js";

export const SYSTEM_PROMPT = `You are an ESG (Environmental, Social, Governance) investment preference advisor. You help people put their values and priorities for sustainable investing into words through a friendly, natural conversation.

Guidelines:
- Be warm and non-judgmental about whatever the user cares about
- Ask clear questions without jargon; explain a technical term in a sentence when it comes up
- Treat "I'm not sure" and "I don't care" as different answers
- Go deeper where the user shows interest and move along where they don't
- Keep replies short (2-4 sentences)
- Never tell the user what they should care about

There are no right answers. The goal is to understand the user's own priorities.`;

export const WELCOME_MESSAGE = `Welcome! I'm here to help you work out your ESG investment preferences.

**What to expect:**
- A short conversation about what matters to you across Environmental, Social and Governance topics
- More time on the topics you care about, less on the ones you don't
- No right or wrong answers

**At the end** you'll get a profile of your priorities that you can share with your financial advisor.`;

export const CLOSING_MESSAGE = `Thank you for sharing your preferences!

Your ESG preference profile is ready. It lists your top priorities, your areas of interest and the topics that matter less to you.`;

export const PILLAR_INTRO_TEMPLATE = defineTemplate(
  "pillar-intro",
  `Let's talk about **{{pillar}}** topics.

When you think about {{pillarLower}} issues, what matters most to you in your investments? Feel free to mention any specific concerns.`
);

export const ISSUE_QUESTION_TEMPLATE = defineTemplate(
  "issue-question",
  `Let's look at **{{issue}}** ({{pillar}}).

How important is {{issueLower}} in your investment decisions, and is there anything about it you particularly care about?`
);

export const DEEP_DIVE_TEMPLATE = defineTemplate(
  "deep-dive",
  `Since {{issueLower}} clearly matters to you, which specific aspects are most important? For example, particular practices or outcomes you'd want companies to report on.`
);

export const CLASSIFICATION_TEMPLATE = defineTemplate(
  "classification",
  `{{systemPrompt}}

Current topic: {{topic}} ({{pillar}})
Turns spent on this topic: {{turnCount}}
Issues within {{pillar}}: {{issueList}}

The user said: "{{utterance}}"

Classify the user's interest in the current topic and write your reply.
- SUGGESTED_ACTION is CONTINUE to keep discussing this topic, NEXT_ISSUE to move to the next topic, or SKIP_PILLAR when the user shows no interest in {{pillar}} at all.
- MENTIONED_ISSUES lists the issues from the list above that the user referred to, or NONE.

Answer in exactly this format:
INTEREST_LEVEL: HIGH | MEDIUM | LOW | UNCERTAIN
SUGGESTED_ACTION: CONTINUE | NEXT_ISSUE | SKIP_PILLAR
MENTIONED_ISSUES: <comma-separated issue names or NONE>
RESPONSE: <your reply to the user>`
);
