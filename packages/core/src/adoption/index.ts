export {
  AdoptionStrategyRegistry,
  CuratedAdoption,
  UnknownRegistryAdoption,
  createDefaultAdoptionRegistry,
} from './registry.js';
