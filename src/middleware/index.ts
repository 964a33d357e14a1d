// =====================================================
// Middleware Barrel Export
// =====================================================

export * from './http.middleware';
export * from './express.middleware';
