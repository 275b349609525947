export * from './response_extractor';
export { normalizeProposal, serializeProposal } from './proposal_schema';
export { stripDiffHeaders, isDiffHeader } from './update_block';
export {
  PROPOSAL_KEYS,
  escapeJsonString,
  parseWithRepair,
  reescapeUpdateBlock,
  sanitizeControlCharacters,
} from './json_repair';
