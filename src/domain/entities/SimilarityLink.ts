export interface SimilarityLink {
  incidentA: string;
  incidentB: string;
  score: number;
  threshold: number;
  method: string;
}

export interface ExcludedIncident {
  incidentId: string;
  reason: string;
}
