export {
  EntityRegistry,
  loadEntityRegistry,
  NATION_ID,
  countyId,
  municipalityId,
  districtId,
} from './entity-registry.js';
