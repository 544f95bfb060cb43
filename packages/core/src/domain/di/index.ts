/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports identifiers, registration variants, contracts and error
 * classes. The Infrastructure layer implements the contracts.
 *
 * ```typescript
 * import { createToken } from '@registry-di/core/domain/di';
 *
 * interface ILogger { info(message: string): void; }
 * const ILogger = createToken<ILogger>('ILogger');
 * ```
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type Constructor,
  type AbstractConstructor,
  type ServiceGuard,
  type ServiceIdentifier,
  ServiceToken,
  isServiceIdentifier,
  getServiceName,
  isCompatible,
  isConstructor,
  hasParameterlessConstructor,
  createToken,
} from './service-identifier';

// ============================================================================
// Registration
// ============================================================================

export {
  type ServiceFactory,
  type RegistrationKind,
  type InstanceRegistration,
  type FactoryRegistration,
  type TypeRegistration,
  type Registration,
  createInstanceRegistration,
  createFactoryRegistration,
  createTypeRegistration,
} from './registration';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type ILogger,
  type DuplicatePolicy,
  type IRegistrationOptions,
  type IServiceRegistration,
  type IResolverOptions,
  type IServiceResolver,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  type InjectionErrorCode,
  InjectionError,
  ServiceNotRegisteredError,
  InvalidRegistrationError,
  DuplicateRegistrationError,
  InvalidRegistrationShapeError,
  NoValidConstructorError,
  TypeMismatchError,
  ServiceCreationError,
  LocatorInitializedError,
} from './di.errors';
