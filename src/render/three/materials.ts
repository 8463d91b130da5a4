// src/render/three/materials.ts
import * as THREE from "three";
import type { LayerRule } from "../../types/layer-config";

// Material names that should render as metal.
const METAL_KEYWORDS = [
  "metal",
  "aluminum",
  "aluminium",
  "copper",
  "tungsten",
  "gold",
  "titanium",
  "cobalt",
];

export function isMetallic(material: string): boolean {
  const lower = material.toLowerCase();
  return METAL_KEYWORDS.some((k) => lower.includes(k));
}

// -----------------------------------------------------------------------------
// Per-layer material
// -----------------------------------------------------------------------------

/**
 * Standard material in the layer's configured color. Metals get the
 * glossy copper-like look, everything else a matte dielectric one.
 */
export function createLayerMaterial(rule: LayerRule): THREE.MeshStandardMaterial {
  const [r, g, b] = rule.color;
  const metallic = isMetallic(rule.material);

  const mat = new THREE.MeshStandardMaterial({
    color: new THREE.Color(r, g, b),
    metalness: metallic ? 1.0 : 0.0,
    roughness: metallic ? 0.25 : 0.6,
    transparent: rule.opacity < 1,
    opacity: rule.opacity,
  });

  mat.name = rule.name;
  return mat;
}
