export const PARAMETER_NAMES = [
  'preparedness',
  'teaching',
  'materials',
  'participation',
  'difficulty',
] as const;

export type ParameterName = typeof PARAMETER_NAMES[number];

/** Display labels for each parameter slider. */
export const PARAMETER_LABELS: Record<ParameterName, string> = {
  preparedness: 'Student Preparedness',
  teaching: 'Teaching Effectiveness',
  materials: 'Study Materials',
  participation: 'Class Participation',
  difficulty: 'Subject Difficulty', // higher = harder
};

export function isParameterName(key: string): key is ParameterName {
  return (PARAMETER_NAMES as readonly string[]).includes(key);
}
