/**
 * Filesystem module exports.
 */

export { type BoardParseOptions, checkBoardDocument, parseBoardContent, parseBoardFile } from "./board.js";
