export { BackendClient, BackendError } from './backendClient';
