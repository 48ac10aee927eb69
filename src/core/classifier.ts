/**
 * Severity Classifier
 *
 * The breaking-change severity policy. Ambiguous cases take the higher tier.
 */

import { Severity } from './types';

export type SeverityContext =
  | { changeType: 'REMOVED_ENDPOINT' }
  | { changeType: 'CHANGED_ENDPOINT_METHOD' }
  | { changeType: 'REMOVED_PARAMETER'; wasRequired: boolean }
  | { changeType: 'ADDED_REQUIRED_PARAMETER' }
  | { changeType: 'CHANGED_PARAMETER_TYPE' }
  | { changeType: 'REMOVED_RESPONSE_CODE'; statusCode: string };

/**
 * Success-class status codes ("200", "204", "2XX").
 */
export function isSuccessStatus(statusCode: string): boolean {
  return statusCode.startsWith('2');
}

export function classifySeverity(context: SeverityContext): Severity {
  switch (context.changeType) {
    case 'REMOVED_ENDPOINT':
    case 'CHANGED_ENDPOINT_METHOD':
      return 'CRITICAL';
    case 'REMOVED_PARAMETER':
      return context.wasRequired ? 'CRITICAL' : 'HIGH';
    case 'ADDED_REQUIRED_PARAMETER':
    case 'CHANGED_PARAMETER_TYPE':
      return 'HIGH';
    case 'REMOVED_RESPONSE_CODE':
      return isSuccessStatus(context.statusCode) ? 'CRITICAL' : 'MEDIUM';
  }
}
