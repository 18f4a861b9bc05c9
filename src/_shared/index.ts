/**
 * Shared Resources
 *
 * DTOs and Swagger decorators used by the relay controllers
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';
