import type { ClarificationRecord } from "./schemas.js";

export const MAX_CLARIFY_QUESTIONS = 3;
export const MIN_TOPIC_LENGTH = 20;

const AMBIGUOUS_TERMS = new Set(["it", "this", "that", "they", "them", "something", "anything", "what", "how"]);

const BARE_ABBREVIATIONS = new Set([
  "ai",
  "ml",
  "dl",
  "llm",
  "nlp",
  "cv",
  "ag",
  "ar",
  "vr",
  "mr",
  "web",
  "app",
  "db",
  "os",
  "api"
]);

function words(topic: string): string[] {
  return topic.toLowerCase().split(/\s+/).filter((w) => w.length > 0);
}

function hasAmbiguousTerm(topic: string): boolean {
  return words(topic).some((w) => AMBIGUOUS_TERMS.has(w));
}

export function needsClarification(topic: string): boolean {
  const trimmed = topic.trim();
  if (trimmed.length < MIN_TOPIC_LENGTH) return true;
  if (hasAmbiguousTerm(trimmed)) return true;
  return BARE_ABBREVIATIONS.has(trimmed.toLowerCase());
}

export function generateQuestions(topic: string): string[] {
  const trimmed = topic.trim();
  if (trimmed.length < 5) {
    return [
      "What specific topic would you like to research?",
      "What aspect or angle are you interested in?",
      "What is the purpose of this research?"
    ];
  }

  const questions: string[] = [];
  if (trimmed.length < MIN_TOPIC_LENGTH) {
    questions.push(`Could you provide more context about '${trimmed}'? What specifically would you like to learn?`);
  }
  if (hasAmbiguousTerm(trimmed)) {
    questions.push("Your topic seems vague. Could you be more specific about what you mean?");
  }
  questions.push("What depth of research do you need? (brief overview / comprehensive analysis)");
  return questions.slice(0, MAX_CLARIFY_QUESTIONS);
}

export function pendingClarification(topic: string): ClarificationRecord {
  return {
    status: "pending",
    originalTopic: topic,
    questions: generateQuestions(topic),
    answers: [],
    failureReason: null
  };
}

/**
 * Applies answers to a clarification. No usable answers means the gate failed;
 * otherwise the clarified topic is the original topic followed by the answers.
 */
export function applyAnswers(
  record: ClarificationRecord,
  answers: readonly string[]
): { record: ClarificationRecord; topic: string | null } {
  const usable = answers.map((a) => a.trim()).filter((a) => a.length > 0);
  if (usable.length === 0) {
    return {
      record: { ...record, status: "failed", answers: [], failureReason: "No clarification provided" },
      topic: null
    };
  }
  const topic = [record.originalTopic.trim(), ...usable].filter((part) => part.length > 0).join(" ");
  return {
    record: { ...record, status: "clarified", answers: usable, failureReason: null },
    topic
  };
}
