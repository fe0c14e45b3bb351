import { BaseSourceAdapter } from '../../../features/process/base-source-adapter.js';

/**
 * İşbank: comma-separated UTF-8 exports in English number format, in a
 * current and a legacy header layout. Everything bank-specific is in the
 * configuration.
 */
export class IsbankAdapter extends BaseSourceAdapter {}
