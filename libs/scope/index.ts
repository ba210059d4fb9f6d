export { getDefaultResolver, handlerFor, resolveRegistry, ScopeResolver, scopeKeyFor } from './scopeResolver.js';
