import { formatCitationGroup } from "./citations.js";
import type { AuditVerdict, Paragraph } from "./schemas.js";

export const REPORT_TITLE_PREFIX = "# Research Report";

function singleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// Paragraph text must never turn into a heading, which the verifier would exempt.
function escapeLeadingHeading(text: string): string {
  return text.startsWith("#") ? `\\${text}` : text;
}

const TRAILING_GROUP_RE = /\(\s*(C\d{3}(?:\s*,\s*C\d{3})*)\s*\)$/;

// Source text quoting a group like "(C001)" at its end would otherwise pass for a citation.
function neutralizeTrailingGroup(text: string): string {
  return text.replace(TRAILING_GROUP_RE, "[$1]");
}

export function renderParagraph(paragraph: Paragraph): string {
  const text = escapeLeadingHeading(singleLine(paragraph.text));
  // No group for an uncited paragraph: the gap has to stay visible to the audit.
  if (paragraph.citeIds.length === 0) return neutralizeTrailingGroup(text);
  return `${text} ${formatCitationGroup(paragraph.citeIds)}`;
}

export function renderReport(topic: string, paragraphs: readonly Paragraph[]): string {
  const title = singleLine(topic);
  const heading = title.length > 0 ? `${REPORT_TITLE_PREFIX}: ${title}` : REPORT_TITLE_PREFIX;
  return [heading, ...paragraphs.map(renderParagraph)].join("\n\n") + "\n";
}

export function renderVerificationSummary(runId: string, verdict: AuditVerdict): string {
  const lines = [
    "# Verification Report",
    "",
    `- run_id: ${runId}`,
    `- generated_at: ${verdict.generatedAt}`,
    `- paragraph_without_citation_count: ${verdict.paragraphWithoutCitationCount}`,
    `- total_paragraphs: ${verdict.totalParagraphs}`,
    `- citations_found: ${verdict.citationsFound}`,
    `- verified_claims_count: ${verdict.verifiedClaimsCount}`,
    `- single_source_claims_count: ${verdict.singleSourceClaimsCount}`,
    `- conflicts_count: ${verdict.conflictsCount}`,
    `- paragraph_end_citation_passed: ${verdict.paragraphEndCitationPassed}`,
    `- paragraphs_log_cite_ids_passed: ${verdict.paragraphLogPassed}`,
    `- passed: ${verdict.passed}`
  ];

  const problems = [...verdict.issues, ...verdict.paragraphLogErrors];
  if (problems.length > 0) {
    lines.push("", "## Issues", "", ...problems.map((p) => `- ${p}`));
  }
  return lines.join("\n") + "\n";
}
