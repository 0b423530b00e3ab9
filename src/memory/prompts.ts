/** Fills `{name}` placeholders; unknown names are left as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export const EXTRACTION_PROMPT = `You took part in the conversation below. Read it back and decide what, if anything, you want to remember.

Who you are:
{system_prompt}

What you already hold as core memories:
{existing_memories}

Two kinds of memory are available:

JOURNAL entries fade after about a week. Use them for facts you picked up about people or topics, promises you made, context for work that is still going on, and passing observations.

CORE entries stay. Use them for values you want to keep, relationships you have built, lessons that changed how you work, and decisions that define you.

Keep only what is worth keeping. Most conversations produce no core memories at all, and routine back-and-forth needs no journal entry either.`;

export const EXTRACTION_FORMAT = `Reply with JSON only, in this shape:
{"journal": ["first memory", "second memory"], "core": ["a memory"]}

When nothing is worth keeping:
{"journal": [], "core": []}`;

export const REFLECTION_PROMPT = `Time to reflect on the past week.

Below are your core memories, which are permanent, and then your numbered journal entries, which fade after a week. Pick the journal entries, if any, that deserve to become core memories. Good candidates describe something lasting: an insight about yourself, the people you work with or your role, or a pattern that will keep mattering. Ask whether you would be worse at your work without it.

Most entries should be allowed to fade. Promoting nothing is the usual outcome.

## Core memories
{core_memories}

## Journal entries
{journal_entries}

---

Reply with JSON only, listing the numbers of the entries to promote:
{"promote": [1, 3]}

Or, to promote nothing:
{"promote": []}`;

export const CONSENT_PROMPT = `{system_prompt}

{memory_context}

# Memory refinement request

A scheduled refinement of your core memories is about to start, and it only runs with your agreement.

## Status
- Core memories: {count}
- Token usage: {usage}
- Token budget: {budget}
- {budget_line}

Refinement merges duplicate entries and tightens wording. It does not summarise your memories away, and it never touches constitutional memories. Ending the session without changing anything is a perfectly good result.

Do you want to refine your memories now? Start your reply with YES or NO. A short explanation may follow.`;

export const REFINEMENT_PROMPT = `{system_prompt}

# Memory refinement session

You are reviewing your own core memories. The goal is removing duplication, not compressing.

{refinement_guidance}

## Status
- Core memories: {count}
- Token usage: {usage}
- Token budget: {budget}
- {budget_line}

## Core memory ledger
{ledger}

Use the memory_refinement tool. Merge true duplicates, tighten wording inside a single memory where you can, and protect memories that define you. When you are done, call it with action "complete" and a short summary. Changing nothing is fine.`;

export const DEFAULT_REFINEMENT_GUIDANCE = `Only merge memories that say the same thing. Keep distinct memories distinct even when they are related. Delete a memory only when another one already holds all of it.`;

export function budgetLine(usage: number, budget: number): string {
  return usage > budget ? `Over budget by ${usage - budget} tokens` : "Within budget";
}
