import type { GraphFragment } from "@/lib/contracts";

export const insulinPathway = "Insulin signaling pathway";
export const mapkPathway = "MAPK signaling pathway";

/** INSR -> IRS1 -> PIK3CA -> AKT1 -| GSK3B, plus a branch into MAPK1 and an isolated TNF. */
export function insulinFragment(): GraphFragment {
  const inInsulin = { labels: ["Gene"], pathways: [insulinPathway] };
  return {
    nodes: [
      { id: "INSR", ...inInsulin },
      { id: "IRS1", ...inInsulin },
      { id: "PIK3CA", ...inInsulin },
      { id: "AKT1", ...inInsulin },
      { id: "GSK3B", ...inInsulin },
      { id: "MAPK1", labels: ["Gene"], pathways: [mapkPathway] },
      { id: "TNF", labels: ["Gene"], pathways: [] },
    ],
    edges: [
      { source: "INSR", target: "IRS1", relation: "activation" },
      { source: "IRS1", target: "PIK3CA", relation: "activation" },
      { source: "PIK3CA", target: "AKT1", relation: "activation" },
      { source: "AKT1", target: "GSK3B", relation: "inhibition" },
      { source: "INSR", target: "MAPK1", relation: "activation" },
    ],
  };
}
