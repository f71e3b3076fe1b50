/**
 * Algorithm modes of a flow, one-to-one with an executor type
 */
export enum FlowAlg {
  MANUAL = 'manual',
  DATA = 'data',
  DATA_OPT = 'data-opt',
  EXEC = 'exec',
}

const aliases: Readonly<Record<string, FlowAlg>> = {
  manual: FlowAlg.MANUAL,
  data: FlowAlg.DATA,
  'data-opt': FlowAlg.DATA_OPT,
  'data opt': FlowAlg.DATA_OPT,
  data_opt: FlowAlg.DATA_OPT,
  exec: FlowAlg.EXEC,
};

/**
 * Parses an algorithm mode name, returns undefined for unknown names
 */
export function parseFlowAlg(value: string): FlowAlg | undefined {
  return aliases[value.trim().toLowerCase()];
}
