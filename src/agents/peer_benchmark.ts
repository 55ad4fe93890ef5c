import { normalizeCategory } from "../guidelines/mapping";
import type {
  PeerBenchmarkArtifact,
  PeerPositioning,
  PeerReference,
  Reproducibility,
  StageName,
  StageNarrative,
} from "../schemas/artifacts";
import type { EnterpriseInput } from "../schemas/enterprise_input";
import { STAGE_DEPENDENCIES } from "../workflow/stages";
import { type NarrativeFacts, ReportStageAgent, type StageAgentDependencies, type StageView } from "./base";
import { type PeerTable, REFERENCE_DATA, sectorMatches } from "./reference_data";

interface PeerDraft {
  peers: PeerReference[];
  positioning: PeerPositioning[];
}

/** Caller-supplied peers win; otherwise the sector's reference peers, then the defaults. */
export function resolvePeers(input: EnterpriseInput, table: PeerTable = REFERENCE_DATA.peers): PeerReference[] {
  if (input.peers && input.peers.length > 0) {
    return input.peers.map((peer) => ({
      name: peer.name,
      focus: peer.focus,
      topics: (peer.topics ?? []).map(normalizeCategory),
    }));
  }

  const sectorRule = table.sector_peers.find((rule) => sectorMatches(input.sector, rule.sectors));
  return (sectorRule?.peers ?? table.default_peers).map((peer) => ({
    name: peer.name,
    focus: peer.focus,
    topics: [...peer.topics],
  }));
}

export class PeerBenchmarkAgent extends ReportStageAgent<PeerBenchmarkArtifact, PeerDraft> {
  readonly stage = "PeerBenchmark" as const;
  readonly dependsOn: readonly StageName[] = STAGE_DEPENDENCIES.PeerBenchmark;

  private readonly table: PeerTable;

  constructor(dependencies: StageAgentDependencies, table: PeerTable = REFERENCE_DATA.peers) {
    super(dependencies);
    this.table = table;
  }

  protected draft(view: StageView): PeerDraft {
    const materiality = this.requireArtifact(view, "Materiality");
    const peers = resolvePeers(view.input, this.table);

    const positioning = materiality.payload.topics
      .filter((topic) => topic.material)
      .map((topic): PeerPositioning => {
        const leading = peers.filter((peer) => peer.topics.includes(topic.id)).map((peer) => peer.name);
        if (leading.length > 0) {
          return {
            topic_id: topic.id,
            topic: topic.name,
            position: "peer-led",
            leading_peers: leading,
            note: `${leading.join(", ")} already emphasise ${topic.name.toLowerCase()} in their disclosure.`,
          };
        }

        return {
          topic_id: topic.id,
          topic: topic.name,
          position: "parity",
          leading_peers: [],
          note: `No reference peer stands out on ${topic.name.toLowerCase()}.`,
        };
      });

    return { peers, positioning };
  }

  protected narrativeFacts(draft: PeerDraft, view: StageView): NarrativeFacts {
    const peerLed = draft.positioning.filter((entry) => entry.position === "peer-led");

    return {
      headline: `${view.input.name} is compared with ${draft.peers.length} peers; peers lead on ${peerLed.length} of ${draft.positioning.length} material topics.`,
      points: [
        ...draft.peers.map((peer) => `${peer.name}: ${peer.focus}`),
        ...peerLed.map((entry) => `${entry.topic}: led by ${entry.leading_peers.join(", ")}`),
      ],
    };
  }

  protected finalize(draft: PeerDraft, narrative: StageNarrative, reproducibility: Reproducibility): PeerBenchmarkArtifact {
    return {
      stage: this.stage,
      payload: { ...narrative, peers: draft.peers, positioning: draft.positioning },
      citations: this.guidelines.lookup("materiality_process"),
      sections: draft.positioning.map((entry) => entry.topic_id),
      reproducibility,
    };
  }
}
