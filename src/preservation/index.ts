/**
 * Preservation module - placeholder protection, restoration and QA checks
 */

export * from './Placeholder';
export * from './RestorationMap';
export * from './PreservationEngine';
export * from './QaValidators';
export * from './Glossary';
