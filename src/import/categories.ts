/** Italian space category prefixes to English; first match wins. */
export const CATEGORY_IT_TO_EN: ReadonlyArray<readonly [string, string]> = [
  ["UFFICI", "Office"],
  ["AULE", "Classroom"],
  ["AULA", "Classroom"],
  ["SERVIZI", "Restroom"],
  ["WC", "Restroom"],
  ["CIRC.ORIZ", "Corridor"],
  ["CONNETTIVO", "Corridor"],
  ["SCALE", "Stairs"],
  ["DEPOSITI", "Storage"],
  ["DEPOSITO", "Storage"],
  ["TECNICI", "Technical Room"],
  ["LOCALE TECNICO", "Technical Room"],
  ["LABORATORI", "Laboratory"],
  ["LABORATORIO", "Laboratory"],
  ["RISTORO", "Break Room"],
  ["SPAZI COMPLEMENTARI", "Support Space"],
  ["SALA RIUNIONI", "Meeting Room"],
  ["SALA STUDIO", "Study Room"]
];

export function translateCategory(categoryIt: string | null | undefined): string | null {
  if (!categoryIt) return null;
  const upper = categoryIt.toUpperCase();
  const hit = CATEGORY_IT_TO_EN.find(([it]) => upper.includes(it));
  return hit ? hit[1] : null;
}
