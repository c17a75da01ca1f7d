import { ARTIFACT_NAMES, artifactAbsPath, errorMessage, nowIso, tryReadTextFile } from "./utils.js";
import { z } from "zod";
import { CITATION_ID_RE, type AuditVerdict, type VerificationVerdict } from "./schemas.js";

// The group must be the very last thing in the paragraph: "(C001)" or "(C001, C002)".
const TRAILING_CITATION_RE = /\((C\d{3}(?:, C\d{3})*)\)$/;

// A blank line, or a line break followed by a non-space character, starts a new
// paragraph. Indented continuation lines stay with the paragraph above them.
const PARAGRAPH_BOUNDARY_RE = /\n\s*\n|\n(?=\S)/;

// Ids are checked one by one so each bad id gets its own message.
const ParagraphLogLineSchema = z.object({
  text: z.string(),
  citeIds: z.array(z.unknown())
});

export type ParagraphLogResult = {
  passed: boolean;
  errors: string[];
  /** Records that parsed, whether or not they passed. */
  count: number;
};

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(PARAGRAPH_BOUNDARY_RE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function isHeading(paragraph: string): boolean {
  return paragraph.trimStart().startsWith("#");
}

/** The ids of the trailing citation group, or null when the paragraph has none. */
export function trailingCitationIds(paragraph: string): string[] | null {
  const match = TRAILING_CITATION_RE.exec(paragraph.trimEnd());
  if (!match) return null;
  return (match[1] ?? "").split(", ");
}

export function verifyText(text: string): VerificationVerdict {
  const paragraphs = splitParagraphs(text);
  const paragraphsWithoutCitation: number[] = [];
  const issues: string[] = [];
  let totalParagraphs = 0;
  let citationsFound = 0;
  let singleSourceClaimsCount = 0;

  paragraphs.forEach((paragraph, index) => {
    if (isHeading(paragraph)) return;
    totalParagraphs += 1;

    const ids = trailingCitationIds(paragraph);
    if (!ids) {
      paragraphsWithoutCitation.push(index);
      issues.push(`Paragraph ${index} does not end with a citation group`);
      return;
    }
    citationsFound += 1;
    if (ids.length === 1) singleSourceClaimsCount += 1;
  });

  return {
    passed: paragraphsWithoutCitation.length === 0,
    totalParagraphs,
    paragraphsWithoutCitation,
    paragraphWithoutCitationCount: paragraphsWithoutCitation.length,
    citationsFound,
    verifiedClaimsCount: citationsFound,
    singleSourceClaimsCount,
    // Conflict detection is not implemented; the slot is kept for report consumers.
    conflictsCount: 0,
    issues
  };
}

export function verifyParagraphLog(lines: readonly string[]): ParagraphLogResult {
  const errors: string[] = [];
  let count = 0;

  lines.forEach((rawLine, i) => {
    const line = rawLine.trim();
    if (line.length === 0) return;
    const lineNo = i + 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      errors.push(`Line ${lineNo}: invalid JSON: ${errorMessage(err)}`);
      return;
    }

    const parsed = ParagraphLogLineSchema.safeParse(raw);
    if (!parsed.success) {
      errors.push(`Line ${lineNo}: not a paragraph record ({text, citeIds})`);
      return;
    }

    count += 1;
    const { citeIds } = parsed.data;
    if (citeIds.length === 0) {
      errors.push(`Line ${lineNo}: citeIds is empty`);
      return;
    }
    for (const cid of citeIds) {
      if (typeof cid !== "string") errors.push(`Line ${lineNo}: citeId ${JSON.stringify(cid)} is not a string`);
      else if (!CITATION_ID_RE.test(cid)) errors.push(`Line ${lineNo}: citeId ${cid} invalid format (expected C001-C999)`);
    }
  });

  if (count === 0 && errors.length === 0) errors.push("paragraph log is empty");

  return { passed: errors.length === 0, errors, count };
}

export function combineVerdicts(report: VerificationVerdict, log: ParagraphLogResult): AuditVerdict {
  const paragraphEndCitationPassed = report.paragraphWithoutCitationCount === 0;
  return {
    ...report,
    passed: report.passed && log.passed && paragraphEndCitationPassed,
    reportPassed: report.passed,
    paragraphEndCitationPassed,
    paragraphLogPassed: log.passed,
    paragraphLogErrors: log.errors,
    paragraphLogCount: log.count,
    generatedAt: nowIso()
  };
}

export class MissingReportError extends Error {
  constructor(readonly runId: string) {
    super(`Report not found for run ${runId}`);
    this.name = "MissingReportError";
  }
}

/** Re-verifies a run from its persisted report and paragraph log. */
export async function verifyRunArtifacts(runId: string): Promise<AuditVerdict> {
  const report = await tryReadTextFile(artifactAbsPath(runId, ARTIFACT_NAMES.report));
  if (report === null) throw new MissingReportError(runId);

  const paragraphLog = await tryReadTextFile(artifactAbsPath(runId, ARTIFACT_NAMES.paragraphs));
  const logResult: ParagraphLogResult =
    paragraphLog === null
      ? { passed: false, errors: [`${ARTIFACT_NAMES.paragraphs} not found`], count: 0 }
      : verifyParagraphLog(paragraphLog.split("\n"));

  return combineVerdicts(verifyText(report), logResult);
}
