import { NotFoundError } from "../errors";
import { type Artifact, type StageArtifactMap, type StageName } from "../schemas/artifacts";
import type { ReportPackage } from "../schemas/report_package";
import { isStageName } from "./stages";

/** Section references a confirmation may target: `Stage` or `Stage/subSection`. */
export function hasPackageSection(pkg: Pick<ReportPackage, "artifacts">, reference: string): boolean {
  const [stage, subSection, ...rest] = reference.split("/");
  if (!stage || rest.length > 0) {
    return false;
  }

  const artifact = pkg.artifacts.find((entry) => entry.stage === stage);
  if (!artifact) {
    return false;
  }

  return subSection === undefined || artifact.sections.includes(subSection);
}

/** Exposes one stage's artifact from a sealed package, e.g. for exporters. */
export function getPackageSection<S extends StageName>(pkg: Pick<ReportPackage, "artifacts" | "package_id">, stage: S): StageArtifactMap[S];
export function getPackageSection(pkg: Pick<ReportPackage, "artifacts" | "package_id">, stage: string): Artifact;
export function getPackageSection(pkg: Pick<ReportPackage, "artifacts" | "package_id">, stage: string): Artifact {
  const artifact = isStageName(stage) ? pkg.artifacts.find((entry) => entry.stage === stage) : undefined;
  if (!artifact) {
    throw new NotFoundError(`Package ${pkg.package_id} has no ${stage} section`);
  }
  return artifact;
}
