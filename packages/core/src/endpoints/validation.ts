/**
 * Relation endpoint validation
 */

import {
  RELATION_INTERFACE_NAME,
  RelationInterfaceMismatchError,
  RelationNotFoundError,
  RelationRoleMismatchError,
  type RelationEndpointSpec,
  type RelationRole,
} from '@scrapelink/shared';

/**
 * Check that `relationName` is declared, speaks the expected interface and
 * sits on the expected side. Throws one of the ConfigMismatchError family.
 */
export function validateRelationEndpoint(
  endpoints: readonly RelationEndpointSpec[],
  relationName: string,
  expectedRole: RelationRole,
  expectedInterface: string = RELATION_INTERFACE_NAME
): RelationEndpointSpec {
  const endpoint = endpoints.find((candidate) => candidate.name === relationName);
  if (!endpoint) {
    throw new RelationNotFoundError(relationName);
  }

  if (endpoint.interface !== expectedInterface) {
    throw new RelationInterfaceMismatchError(relationName, expectedInterface, endpoint.interface);
  }

  if (endpoint.role !== expectedRole) {
    throw new RelationRoleMismatchError(relationName, expectedRole, endpoint.role);
  }

  return endpoint;
}
