// Seat Posture Server - Posture label reference

export interface PostureLabel {
  id: number;
  name: string;
  description: string;
}

export const POSTURE_LABELS: readonly PostureLabel[] = [
  { id: 0, name: "Normal Posture", description: "Upright, balanced seated posture" },
  { id: 1, name: "Turtle Neck", description: "Head pushed forward of the shoulders" },
  { id: 2, name: "Head Down", description: "Neck bent down, e.g. looking at a phone" },
  { id: 3, name: "Forward Lean", description: "Torso leaning forward off the backrest" },
  { id: 4, name: "Right Lean", description: "Body tilted to the right" },
  { id: 5, name: "Left Lean", description: "Body tilted to the left" },
  { id: 6, name: "Right Leg Cross", description: "Right leg crossed over the left" },
  { id: 7, name: "Left Leg Cross", description: "Left leg crossed over the right" },
];

/** Number of posture classes every model must score. */
export const CLASS_COUNT = POSTURE_LABELS.length;

export const NORMAL_POSTURE = 0;
export const TURTLE_NECK = 1;
export const FORWARD_LEAN = 3;
export const RIGHT_LEAN = 4;
export const LEFT_LEAN = 5;
export const RIGHT_LEG_CROSS = 6;
export const LEFT_LEG_CROSS = 7;

export function postureName(id: number): string {
  return POSTURE_LABELS[id]?.name ?? `Unknown_${id}`;
}
