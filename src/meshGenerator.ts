import * as THREE from 'three';
import type { CoordinateSet, Mesh } from './types';
import { ConfigurationError } from './errors';
import { slugify } from './slug';

export interface MeshGeneratorParams {
  coordinates: CoordinateSet;
  /** Used width of the base slab */
  widthMm: number;
  /** Used depth of the base slab */
  heightMm: number;
  dotDiameterMm: number;
  /** Dot height above the base */
  dotHeightMm: number;
  baseThicknessMm: number;
  /** Side facets per dot, at least 3 */
  segments: number;
}

export interface MeshResult {
  base: Mesh;
  /** Keyed by palette name; colors without dots have no entry */
  colors: Map<string, Mesh>;
}

export const BASE_PART_NAME = 'base';

function vertex(x: number, y: number, z: number): THREE.Vector3 {
  return new THREE.Vector3(x, y, z);
}

function triangle(a: THREE.Vector3, b: THREE.Vector3, c: THREE.Vector3): THREE.Triangle {
  return new THREE.Triangle(a, b, c);
}

/**
 * Appends a rectangular prism between two opposite corners.
 * Two triangles per face, 12 in total.
 */
export function addBox(
  tris: THREE.Triangle[],
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  z0: number,
  z1: number
): void {
  const faces: Array<[THREE.Vector3, THREE.Vector3, THREE.Vector3, THREE.Vector3]> = [
    // Bottom and top are wound from opposite sides
    [vertex(x0, y0, z0), vertex(x1, y0, z0), vertex(x1, y1, z0), vertex(x0, y1, z0)],
    [vertex(x0, y0, z1), vertex(x0, y1, z1), vertex(x1, y1, z1), vertex(x1, y0, z1)],
    // Sides, counter-clockwise around the slab
    [vertex(x0, y0, z0), vertex(x0, y0, z1), vertex(x1, y0, z1), vertex(x1, y0, z0)],
    [vertex(x1, y0, z0), vertex(x1, y0, z1), vertex(x1, y1, z1), vertex(x1, y1, z0)],
    [vertex(x1, y1, z0), vertex(x1, y1, z1), vertex(x0, y1, z1), vertex(x0, y1, z0)],
    [vertex(x0, y1, z0), vertex(x0, y1, z1), vertex(x0, y0, z1), vertex(x0, y0, z0)],
  ];

  for (const [a, b, c, d] of faces) {
    tris.push(triangle(a, b, c));
    tris.push(triangle(a, c, d));
  }
}

/**
 * Appends a vertical cylinder approximated by `segments` facets.
 * Each segment adds a side quad (2 triangles), a top fan triangle and a
 * bottom fan triangle.
 */
export function addCylinder(
  tris: THREE.Triangle[],
  cx: number,
  cy: number,
  radius: number,
  z0: number,
  z1: number,
  segments: number
): void {
  const step = (2 * Math.PI) / segments;

  for (let i = 0; i < segments; i++) {
    const a0 = step * i;
    const a1 = step * (i + 1);
    const x0 = cx + radius * Math.cos(a0);
    const y0 = cy + radius * Math.sin(a0);
    const x1 = cx + radius * Math.cos(a1);
    const y1 = cy + radius * Math.sin(a1);

    // Side
    tris.push(triangle(vertex(x0, y0, z0), vertex(x1, y1, z0), vertex(x1, y1, z1)));
    tris.push(triangle(vertex(x0, y0, z0), vertex(x1, y1, z1), vertex(x0, y0, z1)));
    // Top fan
    tris.push(triangle(vertex(cx, cy, z1), vertex(x1, y1, z1), vertex(x0, y0, z1)));
    // Bottom fan
    tris.push(triangle(vertex(cx, cy, z0), vertex(x0, y0, z0), vertex(x1, y1, z0)));
  }
}

/**
 * Generates the base slab and one dot assembly per color.
 * - Base: z=0 to z=baseThickness over the used width x height
 * - Colors: one cylinder per dot from z=baseThickness to z=baseThickness+dotHeight
 */
export function generateMeshes(params: MeshGeneratorParams): MeshResult {
  const {
    coordinates,
    widthMm,
    heightMm,
    dotDiameterMm,
    dotHeightMm,
    baseThicknessMm,
    segments,
  } = params;

  if (!Number.isInteger(segments) || segments < 3) {
    throw new ConfigurationError(`Cylinder segments must be an integer >= 3 (got ${segments})`);
  }

  const baseTriangles: THREE.Triangle[] = [];
  addBox(baseTriangles, 0, 0, widthMm, heightMm, 0, baseThicknessMm);

  const radius = dotDiameterMm / 2;
  const z0 = baseThicknessMm;
  const z1 = baseThicknessMm + dotHeightMm;
  const colors = new Map<string, Mesh>();

  for (const [name, points] of coordinates) {
    if (points.length === 0) continue;

    const triangles: THREE.Triangle[] = [];
    for (const { x, y } of points) {
      addCylinder(triangles, x, y, radius, z0, z1, segments);
    }
    colors.set(name, { name: slugify(name), triangles });
  }

  return {
    base: { name: BASE_PART_NAME, triangles: baseTriangles },
    colors,
  };
}

/**
 * Unit normal from the winding of the facet.
 * Degenerate facets get the zero vector.
 */
export function computeFacetNormal(facet: THREE.Triangle): THREE.Vector3 {
  return facet.getNormal(new THREE.Vector3());
}

/**
 * Converts a mesh to a non-indexed BufferGeometry (three vertices per facet)
 */
export function toBufferGeometry(mesh: Mesh): THREE.BufferGeometry {
  const positions = new Float32Array(mesh.triangles.length * 9);

  mesh.triangles.forEach((facet, i) => {
    [facet.a, facet.b, facet.c].forEach((v, j) => {
      positions.set([v.x, v.y, v.z], i * 9 + j * 3);
    });
  });

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  return geometry;
}

export interface PartBounds {
  min: [number, number, number];
  max: [number, number, number];
}

export interface PartStats {
  triangles: number;
  bounds: PartBounds | null;
}

/**
 * Triangle count and bounding box per part, keyed by part (slug) name
 */
export function getMeshStats(result: MeshResult): Map<string, PartStats> {
  const stats = new Map<string, PartStats>();

  for (const mesh of [result.base, ...result.colors.values()]) {
    const box = new THREE.Box3();
    for (const facet of mesh.triangles) {
      box.expandByPoint(facet.a).expandByPoint(facet.b).expandByPoint(facet.c);
    }

    stats.set(mesh.name, {
      triangles: mesh.triangles.length,
      bounds: box.isEmpty()
        ? null
        : { min: [box.min.x, box.min.y, box.min.z], max: [box.max.x, box.max.y, box.max.z] },
    });
  }

  return stats;
}
