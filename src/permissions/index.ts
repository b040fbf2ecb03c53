export type { AuthUser, AuthEnv, Permission, PermissionContext } from './types.js';
export {
  NotImplementedError,
  BinaryOperator,
  UnaryOperator,
  AndOperator,
  OrOperator,
  XorOperator,
  NotOperator,
  andOf,
  orOf,
  xorOf,
  notOf,
  allOf,
  anyOf,
} from './operators.js';
export {
  definePermission,
  BasePermission,
  AllowAny,
  IsAuthenticated,
  IsStaff,
  IsAdmin,
  IsReadOnly,
  IsAuthenticatedOrReadOnly,
  hasRole,
  hasPermissions,
} from './permissions.js';
export { requirePermission } from './guards.js';
