export {
  JwtIdentityResolver,
  type IdentityResolver,
  type IdentityCredentials,
} from './identity-resolver.js';
