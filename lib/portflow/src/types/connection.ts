/**
 * Result of a connect or disconnect request.
 * Requests never throw for invalid input, they answer with one of these codes.
 */
export enum ConnValidType {
  /** Connection or disconnection is allowed */
  VALID = 'valid',
  /** Both ports belong to the same node */
  SAME_NODE = 'same-node',
  /** Both ports are inputs or both are outputs */
  SAME_IO = 'same-io',
  /** Input given where output was expected, and vice versa */
  IO_MISMATCH = 'io-mismatch',
  /** One port is a data port and the other an exec port */
  DIFF_ALG_TYPE = 'diff-alg-type',
  /** The input's allowed data does not accept the output's declared type */
  DATA_MISMATCH = 'data-mismatch',
  /** The input already has an incoming connection */
  INPUT_TAKEN = 'input-taken',
  /** The ports are already connected */
  ALREADY_CONNECTED = 'already-connected',
  /** The ports are not connected */
  ALREADY_DISCONNECTED = 'already-disconnected',
}

/**
 * Connection expressed through port indices:
 * [source node index, source output index, target node index, target input index]
 */
export type ConnectionTuple = readonly [number, number, number, number];
