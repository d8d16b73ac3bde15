/**
 * @deskflow/auth
 *
 * Queue-scoped permission checks and caller identity.
 */

export { default as GroupUser } from './models/groupUser';
export type { QueueGrantRow } from './models/groupUser';
export {
  PERMISSION_KEYS,
  parsePermissionKey,
  grantingKeys,
  rankQueuePermission,
} from './lib/permissionKeys';
export { createCallerIdentity, callerIdentitySchema } from './lib/callerIdentity';
export type { RawCallerIdentity } from './lib/callerIdentity';
export {
  QueueAccessResolver,
  ALL_QUEUES,
  queueScope,
  scopeIncludes,
  isScopeEmpty,
} from './lib/queueAccess';
export type { QueueAccessResolverOptions } from './lib/queueAccess';
export {
  pickPreferredQueues,
  loadPreferredQueuesForCustomers,
  loadPreferredQueuesForCustomerUsers,
} from './lib/preferredQueue';
