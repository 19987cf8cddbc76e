export {
  type ProcessHandle,
  type ProcessSupervisor,
  NodeProcessSupervisor,
} from './processSupervisor';
