const NUMBERED_ITEM = /^\d+[.)]\s*(.*)$/;
// Labels count only at the start of a line, so "table a1:" inside a question stays text.
const QA_BLOCK = /^\s*Q\d+:\s*([\s\S]*?)\s*^\s*A\d+:\s*([\s\S]*?)(?=^\s*Q\d+:|$(?![\s\S]))/gim;
const BULLET = /^[-•*]\s*/;
const LABEL_PREFIX = /^(Summary:|Key Points:|Topics:)\s*/;

export const MAX_TOPIC_WORDS = 3;

/** Strip a leading section label and fold the text onto one line. */
export function cleanLlmOutput(text: string): string {
  return text.trim().replace(LABEL_PREFIX, "").replace(/\s+/g, " ").trim();
}

/** Items of a `1.` / `1)` list; other lines are ignored. */
export function parseNumberedList(text: string): string[] {
  const items: string[] = [];
  for (const line of text.trim().split("\n")) {
    const match = NUMBERED_ITEM.exec(line.trim());
    const item = match?.[1]?.trim();
    if (item) items.push(item);
  }
  return items;
}

/**
 * `Qn:` / `An:` blocks, each label opening a line, in order. A question missing its trailing `?` gets
 * one; blocks with an empty side are dropped.
 */
export function parseQaPairs(text: string): { questions: string[]; answers: string[] } {
  const questions: string[] = [];
  const answers: string[] = [];

  for (const match of text.matchAll(QA_BLOCK)) {
    let question = (match[1] ?? "").trim();
    const answer = (match[2] ?? "").trim();
    if (!question || !answer) continue;
    if (!question.endsWith("?")) question += "?";
    questions.push(question);
    answers.push(answer);
  }

  return { questions, answers };
}

/** Bullet-list items of at most three words. Label lines ending in `:` are skipped. */
export function parseTopicList(text: string): string[] {
  const topics: string[] = [];
  for (const line of text.trim().split("\n")) {
    const topic = line.trim().replace(BULLET, "").trim();
    if (!topic || topic.endsWith(":")) continue;
    if (topic.split(/\s+/).length <= MAX_TOPIC_WORDS) {
      topics.push(topic);
    }
  }
  return topics;
}
