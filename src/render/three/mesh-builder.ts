// src/render/three/mesh-builder.ts
import * as THREE from "three";
import type { Solid3D, Vec3 } from "../../types/layout-model";
import type { ConversionResult } from "../../core/pipeline";
import { createLayerMaterial } from "./materials";

// --------------------------
// Solid -> BufferGeometry
// --------------------------

/**
 * Triangles of a prism: the top cap wound counter-clockwise seen from
 * +z, the bottom cap the other way, two triangles per side quad. Indices
 * refer to solid.vertices.
 */
export function solidTriangles(solid: Solid3D): number[] {
  const n = solid.bottomFace.length;
  const contour = solid.bottomFace.map(
    (i) => new THREE.Vector2(solid.vertices[i].x, solid.vertices[i].y)
  );
  const caps = THREE.ShapeUtils.triangulateShape(contour, []);

  const indices: number[] = [];
  for (const [a, b, c] of caps) {
    const ccw = cross2(solid.vertices[a], solid.vertices[b], solid.vertices[c]) > 0;
    const [p, q] = ccw ? [b, c] : [c, b];
    indices.push(n + a, n + p, n + q);
    indices.push(a, q, p);
  }

  for (const [i, next, topNext, top] of solid.sideFaces) {
    indices.push(i, next, topNext);
    indices.push(i, topNext, top);
  }

  return indices;
}

function cross2(a: Vec3, b: Vec3, c: Vec3): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

/**
 * Indexed geometry with the solid's 2N vertices and computed normals.
 */
export function solidToBufferGeometry(solid: Solid3D): THREE.BufferGeometry {
  const positions: number[] = [];
  for (const v of solid.vertices) positions.push(v.x, v.y, v.z);

  const geom = new THREE.BufferGeometry();
  geom.setAttribute("position", new THREE.Float32BufferAttribute(positions, 3));
  geom.setIndex(solidTriangles(solid));
  geom.computeVertexNormals();
  return geom;
}

/**
 * One geometry for many solids, indices offset per solid.
 */
export function mergeSolidsGeometry(solids: readonly Solid3D[]): THREE.BufferGeometry {
  const positions: number[] = [];
  const indices: number[] = [];
  let vertexOffset = 0;

  for (const solid of solids) {
    for (const v of solid.vertices) positions.push(v.x, v.y, v.z);
    for (const i of solidTriangles(solid)) indices.push(vertexOffset + i);
    vertexOffset += solid.vertices.length;
  }

  const merged = new THREE.BufferGeometry();
  merged.setAttribute("position", new THREE.Float32BufferAttribute(positions, 3));
  merged.setIndex(indices);
  merged.computeVertexNormals();
  return merged;
}

// --------------------------
// Conversion -> scene graph
// --------------------------

/**
 * Group with one mesh per converted layer, ready for the three.js
 * exporters. Layers without solids are left out.
 */
export function buildLayerGroup(result: ConversionResult): THREE.Group {
  const group = new THREE.Group();
  group.name = result.structureName;

  for (const layer of result.layers) {
    if (layer.solids.length === 0) continue;

    const mesh = new THREE.Mesh(
      mergeSolidsGeometry(layer.solids),
      createLayerMaterial(layer.rule)
    );
    mesh.name = layer.rule.name;
    mesh.userData = {
      layer: layer.rule.layer,
      datatype: layer.rule.datatype,
      material: layer.rule.material,
      zBottom: layer.rule.zBottom,
      zTop: layer.rule.zTop,
    };
    group.add(mesh);
  }

  return group;
}
