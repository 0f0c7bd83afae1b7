import type { PlaceholderMap } from '../../types/agreement.js';
import { PlaceholderCollisionError } from '../../types/errors.js';

/**
 * Placeholder names known to the agreement templates
 */
export const Placeholder = {
  IsSample: 'IsSample',
  DansManagedDoi: 'DansManagedDoi',
  DansManagedEncodedDoi: 'DansManagedEncodedDoi',
  DateSubmitted: 'DateSubmitted',
  Title: 'Title',
  UnderEmbargo: 'UnderEmbargo',
  DateAvailable: 'DateAvailable',
  DepositorName: 'DepositorName',
  DepositorOrganisation: 'DepositorOrganisation',
  DepositorAddress: 'DepositorAddress',
  DepositorPostalCode: 'DepositorPostalCode',
  DepositorCity: 'DepositorCity',
  DepositorCountry: 'DepositorCountry',
  DepositorTelephone: 'DepositorTelephone',
  DepositorEmail: 'DepositorEmail',
  OpenAccess: 'OpenAccess',
  DatasetAccessRights: 'DatasetAccessRights',
  MetadataTable: 'MetadataTable',
  MetadataKey: 'MetadataKey',
  MetadataValue: 'MetadataValue',
  HasFiles: 'HasFiles',
  FileTable: 'FileTable',
  FilePath: 'FilePath',
  FileChecksum: 'FileChecksum',
  FileAccessibleTo: 'FileAccessibleTo',
  FileVisibleTo: 'FileVisibleTo',
  FooterText: 'FooterText',
  CurrentDateAndTime: 'CurrentDateAndTime',
} as const;

export type PlaceholderName = (typeof Placeholder)[keyof typeof Placeholder];

/**
 * Union of partial placeholder maps
 *
 * @throws PlaceholderCollisionError when two maps define the same key
 */
export function mergePlaceholders(...maps: PlaceholderMap[]): PlaceholderMap {
  const merged: PlaceholderMap = {};
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      if (Object.prototype.hasOwnProperty.call(merged, key)) {
        throw new PlaceholderCollisionError(key);
      }
      merged[key] = value;
    }
  }
  return merged;
}
