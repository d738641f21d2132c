import { tokenize } from "./request-normalization.js";
import type { EnrichedResult, QualityTier, RankedResult } from "./types.js";

const QUALITY_BOOST: Record<QualityTier, number> = {
  UHD: 12,
  HD: 9,
  SD: 4,
  CAM: -5,
  unknown: 0,
};

const METADATA_BOOST = 5;

export function rankResults(queryTokens: string[], candidates: EnrichedResult[]): RankedResult[] {
  const scored = candidates.map((candidate) => scoreResult(queryTokens, candidate));

  scored.sort((left, right) => {
    if (right.score !== left.score) {
      return right.score - left.score;
    }

    const titleOrder = left.attributes.sortTitle.localeCompare(right.attributes.sortTitle);
    if (titleOrder !== 0) {
      return titleOrder;
    }

    return left.result.ident.localeCompare(right.result.ident);
  });

  return scored.map((item, index) => ({
    ...item,
    rank: index + 1,
  }));
}

export function scoreResult(
  queryTokens: string[],
  candidate: EnrichedResult,
): Omit<RankedResult, "rank"> {
  const reasons: string[] = [];
  let score = 0;

  const titleTokens = new Set([
    ...tokenize(candidate.attributes.title),
    ...tokenize(candidate.metadata?.title ?? ""),
    ...tokenize(candidate.metadata?.originalTitle ?? ""),
  ]);
  const overlapCount = queryTokens.reduce(
    (count, token) => count + (titleTokens.has(token) ? 1 : 0),
    0,
  );

  if (queryTokens.length > 0) {
    const overlapRatio = overlapCount / queryTokens.length;
    score += overlapRatio * 60;
    reasons.push(`query-overlap:${overlapRatio.toFixed(3)}`);
  }

  const qualityBoost = QUALITY_BOOST[candidate.attributes.quality];
  if (qualityBoost !== 0) {
    score += qualityBoost;
    reasons.push(`quality:${candidate.attributes.quality}:${formatSigned(qualityBoost)}`);
  }

  const netVotes = (candidate.result.positiveVotes ?? 0) - (candidate.result.negativeVotes ?? 0);
  if (netVotes > 0) {
    const voteBoost = Math.min(15, Math.log10(netVotes + 1) * 5);
    score += voteBoost;
    reasons.push(`votes:+${voteBoost.toFixed(3)}`);
  } else if (netVotes < 0) {
    const votePenalty = Math.min(10, Math.log10(-netVotes + 1) * 5);
    score -= votePenalty;
    reasons.push(`votes:-${votePenalty.toFixed(3)}`);
  }

  if (candidate.metadata !== undefined) {
    score += METADATA_BOOST;
    reasons.push(`metadata:${candidate.metadata.provider}`);
  }

  return {
    ...candidate,
    score: roundScore(score),
    reasons,
  };
}

function formatSigned(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function roundScore(value: number): number {
  return Number(value.toFixed(6));
}
