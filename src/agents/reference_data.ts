import { z } from "zod";

import { stakeholderPrioritySchema } from "../schemas/artifacts";
import peersData from "./data/peers.json";
import stakeholdersData from "./data/stakeholders.json";
import topicsData from "./data/topics.json";

const sectorPatternsSchema = z.array(z.string().trim().toLowerCase().min(1)).min(1);

const stakeholderTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  concerns: z.array(z.string().min(1)).min(1),
  engagement_channels: z.array(z.string().min(1)),
  priority: stakeholderPrioritySchema,
});

const stakeholderTableSchema = z.object({
  base_groups: z.array(stakeholderTemplateSchema).min(1),
  sector_groups: z.array(
    z.object({
      sectors: sectorPatternsSchema,
      description_keywords: z.array(z.string().trim().toLowerCase().min(1)),
      group: stakeholderTemplateSchema,
    }),
  ),
});

const topicTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  impact: z.number().min(0).max(5),
  relevance: z.number().min(0).max(5),
  stakeholders: z.array(z.string().min(1)),
});

const topicTableSchema = z.object({
  base_topics: z.array(topicTemplateSchema).min(1),
  sector_topics: z.array(
    z.object({
      sectors: sectorPatternsSchema,
      topic: topicTemplateSchema,
    }),
  ),
});

const peerTemplateSchema = z.object({
  name: z.string().min(1),
  focus: z.string().min(1),
  topics: z.array(z.string().min(1)),
});

const peerTableSchema = z.object({
  sector_peers: z.array(
    z.object({
      sectors: sectorPatternsSchema,
      peers: z.array(peerTemplateSchema).min(1),
    }),
  ),
  default_peers: z.array(peerTemplateSchema).min(1),
});

export type StakeholderTemplate = z.infer<typeof stakeholderTemplateSchema>;
export type StakeholderTable = z.infer<typeof stakeholderTableSchema>;
export type TopicTemplate = z.infer<typeof topicTemplateSchema>;
export type TopicTable = z.infer<typeof topicTableSchema>;
export type PeerTemplate = z.infer<typeof peerTemplateSchema>;
export type PeerTable = z.infer<typeof peerTableSchema>;

export interface ReferenceData {
  stakeholders: StakeholderTable;
  topics: TopicTable;
  peers: PeerTable;
}

export function loadReferenceData(raw: { stakeholders: unknown; topics: unknown; peers: unknown }): ReferenceData {
  return {
    stakeholders: stakeholderTableSchema.parse(raw.stakeholders),
    topics: topicTableSchema.parse(raw.topics),
    peers: peerTableSchema.parse(raw.peers),
  };
}

export const REFERENCE_DATA: ReferenceData = loadReferenceData({
  stakeholders: stakeholdersData,
  topics: topicsData,
  peers: peersData,
});

/** Sector patterns are lowercase stems ("financ", "manufactur") matched anywhere in the sector text. */
export function sectorMatches(sector: string, patterns: readonly string[]): boolean {
  const normalized = sector.trim().toLowerCase();
  return patterns.some((pattern) => normalized.includes(pattern));
}
