/**
 * Service reconciliation
 */

export { diffService, reconstructUrl, canonicalUrl, SERVICE_EXTRA_FIELDS } from './diff.js';
export {
  createService,
  updateService,
  buildCreateServicePayload,
  buildServicePatch,
  declaredServiceFields,
} from './apply.js';
