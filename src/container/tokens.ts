/**
 * @fileoverview Dependency injection tokens.
 * @module src/container/tokens
 */

export const AppConfig = Symbol('AppConfig');
export const StructureDataProvider = Symbol('IStructureDataProvider');
export const StructureFinderService = Symbol('StructureFinderService');
