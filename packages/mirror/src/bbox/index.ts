/**
 * Bounding box parsing, validation and partitioning.
 */

import type { BoundingBox } from "@sandbox-mirror/types";
import { InvalidBboxError } from "../errors.js";

/**
 * Parse `minlon,minlat,maxlon,maxlat`.
 *
 * Axis order is not checked here; see normalizeBbox().
 */
export function parseBbox(text: string): BoundingBox {
  const parts = text.split(",").map((part) => part.trim());
  const values = parts.map(Number);
  if (values.length !== 4 || parts.some((part) => part === "") || !values.every(Number.isFinite)) {
    throw new InvalidBboxError(`Please specify four numbers for the bbox, got "${text}"`);
  }
  const [minLng = NaN, minLat = NaN, maxLng = NaN, maxLat = NaN] = values;
  return { minLng, minLat, maxLng, maxLat };
}

/** Swap min and max on any axis where they are reversed */
export function normalizeBbox(bbox: BoundingBox): BoundingBox {
  return {
    minLng: Math.min(bbox.minLng, bbox.maxLng),
    maxLng: Math.max(bbox.minLng, bbox.maxLng),
    minLat: Math.min(bbox.minLat, bbox.maxLat),
    maxLat: Math.max(bbox.minLat, bbox.maxLat),
  };
}

/** Area in square degrees */
export function bboxArea(bbox: BoundingBox): number {
  return (bbox.maxLng - bbox.minLng) * (bbox.maxLat - bbox.minLat);
}

/**
 * Normalize a bbox and reject it when its area exceeds `maxArea`
 * square degrees.
 */
export function validateBbox(bbox: BoundingBox, maxArea: number): BoundingBox {
  const normalized = normalizeBbox(bbox);
  if (bboxArea(normalized) > maxArea) {
    throw new InvalidBboxError(
      `Bounding box is too big (${bboxArea(normalized).toFixed(4)} sq. degrees, limit ${maxArea}), try 10×10 km`
    );
  }
  return normalized;
}

/**
 * Split a bbox into four quadrants at its midpoints.
 *
 * Order: south-west, north-west, south-east, north-east.
 */
export function splitBbox(bbox: BoundingBox): [BoundingBox, BoundingBox, BoundingBox, BoundingBox] {
  const midLng = (bbox.minLng + bbox.maxLng) / 2;
  const midLat = (bbox.minLat + bbox.maxLat) / 2;
  return [
    { minLng: bbox.minLng, minLat: bbox.minLat, maxLng: midLng, maxLat: midLat },
    { minLng: bbox.minLng, minLat: midLat, maxLng: midLng, maxLat: bbox.maxLat },
    { minLng: midLng, minLat: bbox.minLat, maxLng: bbox.maxLng, maxLat: midLat },
    { minLng: midLng, minLat: midLat, maxLng: bbox.maxLng, maxLat: bbox.maxLat },
  ];
}

/** Overpass bbox format: `south,west,north,east` */
export function formatOverpassBbox(bbox: BoundingBox): string {
  return `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
}

export function fmtBbox(bbox: BoundingBox): string {
  return `[${bbox.minLng.toFixed(4)},${bbox.minLat.toFixed(4)} → ${bbox.maxLng.toFixed(4)},${bbox.maxLat.toFixed(4)}]`;
}
