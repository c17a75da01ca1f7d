import { z } from "zod";
import { ResearchDepthSchema, RunSettingsOverridesSchema } from "../settings.js";

/** Exactly `C` followed by three digits; case-sensitive, nothing around it. */
export const CITATION_ID_RE = /^C\d{3}$/;

export const CitationIdSchema = z.string().regex(CITATION_ID_RE);

export const CitationSchema = z.object({
  cid: CitationIdSchema,
  url: z.string(),
  title: z.string(),
  locator: z.string(),
  fetchedAt: z.string(),
  quoteHash: z.string().optional(),
  localPath: z.string().optional()
});

export const CitationSnapshotSchema = z.array(CitationSchema);

export const SourceSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  relevance: z.number().min(0).max(1)
});

export const FetchedDocumentSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  content: z.string(),
  fetchedAt: z.string()
});

export const FetchedDocumentListSchema = z.array(FetchedDocumentSchema);

export const ExtractedRecordSchema = z.object({
  url: z.string(),
  title: z.string(),
  keyPoints: z.array(z.string()),
  quotes: z.array(z.string())
});

/** One line of the structured paragraph log. */
export const ParagraphSchema = z.object({
  text: z.string().trim().min(1),
  citeIds: z.array(z.string())
});

export const PlanSchema = z.object({
  queries: z.array(z.string()),
  sourceCategories: z.array(z.string()),
  estimatedSourceCount: z.number().int(),
  depth: ResearchDepthSchema
});

export const PlanRecordSchema = RunSettingsOverridesSchema.extend({
  plan: PlanSchema.optional()
});

export const ClarificationStatusSchema = z.enum(["pending", "clarified", "failed"]);

export const ClarificationRecordSchema = z.object({
  status: ClarificationStatusSchema,
  originalTopic: z.string(),
  questions: z.array(z.string()),
  answers: z.array(z.string()),
  failureReason: z.string().nullable()
});

export const VerificationVerdictSchema = z.object({
  passed: z.boolean(),
  totalParagraphs: z.number().int().min(0),
  paragraphsWithoutCitation: z.array(z.number().int().min(0)),
  paragraphWithoutCitationCount: z.number().int().min(0),
  citationsFound: z.number().int().min(0),
  verifiedClaimsCount: z.number().int().min(0),
  singleSourceClaimsCount: z.number().int().min(0),
  conflictsCount: z.number().int().min(0),
  issues: z.array(z.string())
});

export const AuditVerdictSchema = VerificationVerdictSchema.extend({
  reportPassed: z.boolean(),
  paragraphEndCitationPassed: z.boolean(),
  paragraphLogPassed: z.boolean(),
  paragraphLogErrors: z.array(z.string()),
  paragraphLogCount: z.number().int().min(0),
  generatedAt: z.string()
});

export type Citation = z.infer<typeof CitationSchema>;
export type Source = z.infer<typeof SourceSchema>;
export type FetchedDocument = z.infer<typeof FetchedDocumentSchema>;
export type ExtractedRecord = z.infer<typeof ExtractedRecordSchema>;
export type Paragraph = z.infer<typeof ParagraphSchema>;
export type Plan = z.infer<typeof PlanSchema>;
export type PlanRecord = z.infer<typeof PlanRecordSchema>;
export type ClarificationStatus = z.infer<typeof ClarificationStatusSchema>;
export type ClarificationRecord = z.infer<typeof ClarificationRecordSchema>;
export type VerificationVerdict = z.infer<typeof VerificationVerdictSchema>;
export type AuditVerdict = z.infer<typeof AuditVerdictSchema>;
