/**
 * @bibkit/contracts
 *
 * TypeScript interfaces and types shared by the bibkit packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/fragment.js';
export * from './core/element-kind.js';

// Rendering shapes
export * from './render/render.js';

// Parser collaborator
export * from './parser/parser.js';
