import neo4j from 'neo4j-driver';

export const toJsNumber = (val: unknown): number => {
  if (typeof val === 'number') return val;
  return neo4j.isInt(val) ? val.toNumber() : 0;
};
