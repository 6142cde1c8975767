/**
 * Artifact wire protocol
 *
 * Process mode: `<artifact> <document>` prints one record and exits 0, or
 * prints FAILURE_LINE and exits 1.
 *
 * Serve mode: `RECORDC_SERVE=1 <artifact>` reads frames from stdin and answers
 * each with one frame on stdout. In process mode every argument is a document,
 * `--serve` included. A frame is a 4-byte big-endian byte length followed by
 * the UTF-8 payload; payloads are the same records. A payload holding a NUL
 * byte is answered with FAILURE_LINE.
 *
 * Record: `SUCCESS|value1|...|valueN`, values in schema declaration order,
 * pipes inside values are not escaped.
 */

export const SUCCESS_SENTINEL = 'SUCCESS';
export const FAILURE_SENTINEL = 'Failed to parse JSON';
export const FAILURE_LINE = `ERROR|${FAILURE_SENTINEL}`;
export const FIELD_DELIMITER = '|';
export const SERVE_ENV = 'RECORDC_SERVE';
export const SERVE_ENV_VALUE = '1';
export const BOOLEAN_TRUE = 'true';

/** Bytes in a frame's length prefix */
export const FRAME_HEADER_BYTES = 4;
/** Largest payload a uint32 length prefix can describe */
export const MAX_FRAME_BYTES = 0xffffffff;

/** Environment for a serve-mode worker */
export function serveModeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return { ...env, [SERVE_ENV]: SERVE_ENV_VALUE };
}

/** Environment for a process-mode run; an inherited serve switch is dropped */
export function processModeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const { [SERVE_ENV]: _serve, ...rest } = env;
  return rest;
}
