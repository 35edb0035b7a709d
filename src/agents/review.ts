import { DEFAULT_DEFECT_MARKERS } from "../config";

export type DefectDetector = (review: string) => boolean;

const CLEAN_VERDICTS = [/\bno defects\b/i, /\blgtm\b/i, /\bno issues found\b/i];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function markerPattern(marker: string): RegExp {
  const escaped = escapeRegExp(marker.trim());
  const head = /^\w/.test(marker.trim()) ? "\\b" : "";
  const tail = /\w$/.test(marker.trim()) ? "\\b" : "";
  return new RegExp(`${head}${escaped}${tail}`, "i");
}

export function createDefectDetector(markers: string[] = DEFAULT_DEFECT_MARKERS): DefectDetector {
  const patterns = markers.filter((marker) => marker.trim().length > 0).map(markerPattern);
  return (review: string) => {
    const text = review.trim();
    if (!text) {
      return false;
    }
    if (CLEAN_VERDICTS.some((pattern) => pattern.test(text))) {
      return false;
    }
    return patterns.some((pattern) => pattern.test(text));
  };
}

export function extractDefects(review: string): string[] {
  return review
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^(defect|bug)\s*:/i.test(line))
    .map((line) => line.replace(/^(defect|bug)\s*:\s*/i, ""));
}
