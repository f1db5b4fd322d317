import type { HandlerError } from '../errors/provider-errors';
import { HandlerName, type HandlerResult } from '../handlers/types';

// Prefix for each validation message; the message itself comes from the handler
const VALIDATION_PREFIX: Record<HandlerName, string> = {
  [HandlerName.Report]: '🚨 Error: ',
  [HandlerName.Weather]: '🌍 Error: ',
  [HandlerName.Image]: '🖼️ ',
};

const UNEXPECTED_LABEL: Record<HandlerName, string> = {
  [HandlerName.Report]: 'Critical Error',
  [HandlerName.Weather]: 'Weather Prediction Error',
  [HandlerName.Image]: 'Image Processing Error',
};

export function presentError(handler: HandlerName, error: HandlerError): string {
  switch (error.kind) {
    case 'validation':
      return `${VALIDATION_PREFIX[handler]}${error.message}`;
    case 'upstream':
      return `🚨 API Error: ${error.status} - ${error.body}`;
    case 'transport':
      return `🚨 Network Error: ${error.message}`;
    case 'unexpected':
      return `🚨 ${UNEXPECTED_LABEL[handler]}: ${error.message}`;
  }
}

/**
 * Display text for a handler result. This is the only place results become strings.
 */
export function present(handler: HandlerName, result: HandlerResult): string {
  return result.ok ? result.text : presentError(handler, result.error);
}
