export { SimulationError, ErrorCode, isSimulationError, wrapError } from './SimulationError';
