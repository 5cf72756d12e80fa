export { createPlantApi } from './api';
export type { DeviceInfo, PlantApi } from './types';
