export { createDB, Database } from './database.js';
export type { DatabaseOptions } from './database.js';
export { QueryCompiler } from './query-compiler.js';
export type { CompilerOptions } from './query-compiler.js';
export { Executor } from './executor.js';
export type { RowSchema } from './executor.js';
export { QueryPlan, bindPlaceholders } from './query-plan.js';
export type { PlanArg } from './query-plan.js';
export { FieldCatalog, defineEntity, entityFromSchema, toColumnName } from './field-catalog.js';
export type { EntityDefinition, FieldInfo, FieldMap } from './field-catalog.js';
export { ScopeRegistry, SCOPE_CATEGORIES } from './scope-registry.js';
export type { ScopeCategory, ScopeContext, ScopeFunc } from './scope-registry.js';
export { translateFilter, buildAggregate, splitOperands } from './operator-translator.js';
export { Operator, AggregationOp, operatorName, aggregationName } from './request.js';
export type {
    Filter,
    Sort,
    Group,
    Aggregation,
    Join,
    JoinType,
    SubQuery,
    Pagination,
    ScopeValue,
    CustomFilter,
    CustomField,
    FilterRequest,
} from './request.js';
export { filterRequestSchema, parseFilterRequest } from './request-schema.js';
export {
    ValidationError,
    FieldValidationError,
    UnsupportedFeatureError,
    ScopeNotFoundError,
    CompilationError,
    NotFoundError,
    DatabaseError,
    PluginError,
    PluginTimeoutError,
} from './errors.js';
export type { DBConfig, Driver, Row, SQLParam, SQLStatement } from './types.js';

// Security utilities for SQL identifier validation
export {
    validateIdentifier,
    isValidIdentifier,
    quoteIdentifier,
    validateDatabasePath,
    sanitizeForErrorMessage,
} from './sql-utils.js';

// Drivers
export { BaseDriver } from './drivers/base.js';
export { NodeDriver } from './drivers/node.js';

// Plugin system exports
export { PluginManager } from './plugin-system.js';
export type { Plugin, PluginContext, PluginManagerOptions, QueryOperation, HookName } from './plugin-system.js';
export * from './plugins/index.js';

// All query methods are async and run plugin hooks. Sync versions with a 'Sync'
// suffix skip the hooks:
// QueryCompiler: findAll(), findOne(), count() | findAllSync(), findOneSync(), countSync()
// Database: exec(), query(), close() | execSync(), querySync(), closeSync()
