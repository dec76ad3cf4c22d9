export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionStatus,
} from './controllers/connectionManager';
export { createBrowserSocketTransport } from './utils/browserSocketTransport';
