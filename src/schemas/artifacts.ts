import { z } from "zod";

export const STAGE_NAMES = [
  "StakeholderAnalysis",
  "Materiality",
  "PolicyBenchmark",
  "PeerBenchmark",
  "ReportCompiler",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export const stageNameSchema = z.enum(STAGE_NAMES);

export const citationSchema = z.object({
  clause_id: z.string().min(1),
  source: z.enum(["disclosure-guide", "GRI"]),
  text: z.string(),
});

export type Citation = z.infer<typeof citationSchema>;

export const stageNarrativeSchema = z.object({
  summary: z.string().trim().min(1),
  highlights: z.array(z.string().trim().min(1)).max(12),
});

export type StageNarrative = z.infer<typeof stageNarrativeSchema>;

export const reproducibilitySchema = z.enum(["deterministic", "generated"]);

export type Reproducibility = z.infer<typeof reproducibilitySchema>;

export const stakeholderPrioritySchema = z.enum(["High", "Medium", "Low"]);

export const stakeholderGroupSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  concerns: z.array(z.string()),
  engagement_channels: z.array(z.string()),
  priority: stakeholderPrioritySchema,
  rank: z.number().int().positive(),
});

export type StakeholderGroup = z.infer<typeof stakeholderGroupSchema>;

export const stakeholderAnalysisPayloadSchema = stageNarrativeSchema.extend({
  groups: z.array(stakeholderGroupSchema),
});

export type StakeholderAnalysisPayload = z.infer<typeof stakeholderAnalysisPayloadSchema>;

export const MATERIALITY_QUADRANTS = [
  "high-impact-high-relevance",
  "high-impact",
  "high-relevance",
  "moderate",
] as const;

export type MaterialityQuadrant = (typeof MATERIALITY_QUADRANTS)[number];

export const materialTopicSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  category: z.string(),
  impact_score: z.number().min(0).max(5),
  stakeholder_relevance_score: z.number().min(0).max(5),
  stakeholder_groups: z.array(z.string()),
  quadrant: z.enum(MATERIALITY_QUADRANTS),
  material: z.boolean(),
  citations: z.array(citationSchema),
});

export type MaterialTopic = z.infer<typeof materialTopicSchema>;

export const materialityPayloadSchema = stageNarrativeSchema.extend({
  topics: z.array(materialTopicSchema),
  quadrants: z.object({
    "high-impact-high-relevance": z.array(z.string()),
    "high-impact": z.array(z.string()),
    "high-relevance": z.array(z.string()),
    moderate: z.array(z.string()),
  }),
});

export type MaterialityPayload = z.infer<typeof materialityPayloadSchema>;

export const policyAlignmentStatusSchema = z.enum(["aligned", "gap", "not-applicable"]);

export type PolicyAlignmentStatus = z.infer<typeof policyAlignmentStatusSchema>;

export const policyChecklistEntrySchema = z.object({
  topic_id: z.string(),
  topic: z.string(),
  status: policyAlignmentStatusSchema,
  clauses: z.array(citationSchema),
  note: z.string(),
});

export type PolicyChecklistEntry = z.infer<typeof policyChecklistEntrySchema>;

export const policyBenchmarkPayloadSchema = stageNarrativeSchema.extend({
  checklist: z.array(policyChecklistEntrySchema),
});

export type PolicyBenchmarkPayload = z.infer<typeof policyBenchmarkPayloadSchema>;

export const peerReferenceSchema = z.object({
  name: z.string(),
  focus: z.string(),
  topics: z.array(z.string()),
});

export type PeerReference = z.infer<typeof peerReferenceSchema>;

export const peerPositioningSchema = z.object({
  topic_id: z.string(),
  topic: z.string(),
  position: z.enum(["peer-led", "parity"]),
  leading_peers: z.array(z.string()),
  note: z.string(),
});

export type PeerPositioning = z.infer<typeof peerPositioningSchema>;

export const peerBenchmarkPayloadSchema = stageNarrativeSchema.extend({
  peers: z.array(peerReferenceSchema),
  positioning: z.array(peerPositioningSchema),
});

export type PeerBenchmarkPayload = z.infer<typeof peerBenchmarkPayloadSchema>;

export const reportSectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  body: z.string(),
  citation_keys: z.array(z.string()),
});

export type ReportSection = z.infer<typeof reportSectionSchema>;

export const reportCompilerPayloadSchema = stageNarrativeSchema.extend({
  title: z.string(),
  sections: z.array(reportSectionSchema),
  draft_text: z.string(),
});

export type ReportCompilerPayload = z.infer<typeof reportCompilerPayloadSchema>;

function artifactSchemaFor<S extends StageName, P extends z.ZodTypeAny>(stage: S, payload: P) {
  return z.object({
    stage: z.literal(stage),
    payload,
    citations: z.array(citationSchema),
    sections: z.array(z.string()),
    reproducibility: reproducibilitySchema,
  });
}

export const artifactSchema = z.discriminatedUnion("stage", [
  artifactSchemaFor("StakeholderAnalysis", stakeholderAnalysisPayloadSchema),
  artifactSchemaFor("Materiality", materialityPayloadSchema),
  artifactSchemaFor("PolicyBenchmark", policyBenchmarkPayloadSchema),
  artifactSchemaFor("PeerBenchmark", peerBenchmarkPayloadSchema),
  artifactSchemaFor("ReportCompiler", reportCompilerPayloadSchema),
]);

export type Artifact = z.infer<typeof artifactSchema>;

export type StageArtifactMap = {
  [S in StageName]: Extract<Artifact, { stage: S }>;
};

export type StakeholderAnalysisArtifact = StageArtifactMap["StakeholderAnalysis"];
export type MaterialityArtifact = StageArtifactMap["Materiality"];
export type PolicyBenchmarkArtifact = StageArtifactMap["PolicyBenchmark"];
export type PeerBenchmarkArtifact = StageArtifactMap["PeerBenchmark"];
export type ReportCompilerArtifact = StageArtifactMap["ReportCompiler"];

export function findArtifact<S extends StageName>(
  artifacts: readonly Artifact[],
  stage: S,
): StageArtifactMap[S] | undefined {
  return artifacts.find((artifact): artifact is StageArtifactMap[S] => artifact.stage === stage);
}
