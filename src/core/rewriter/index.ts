export { bindDocument, selectAffected, type BindSources } from './bind.js';
export { dedentBody, formatBody, reindentToColumn } from './indent.js';
export { rewriteDocument, type RewriteContext, type RewriteResult } from './rewriter.js';
