export const UPSERT_ADDRESSED_BY = `
  UNWIND $pairs AS pair
  MATCH (c:Cause {key: pair.causeKey})
  MATCH (a:CorrectiveAction {key: pair.actionKey})
  MERGE (c)-[:ADDRESSED_BY]->(a)
`;

export const COUNT_RELATIONSHIPS = `MATCH ()-[r]->() RETURN count(r) as count`;
