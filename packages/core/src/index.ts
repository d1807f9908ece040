/**
 * @fileoverview Task records, validation and the in-memory task store for TaskDesk
 * @version 0.1.0
 */

// Task Types
export * from './types/task';

// Error Handling and Validation
export * from './types/errors';

// Utility Types
export * from './types/common';

// Task Store
export * from './store/task-store';
