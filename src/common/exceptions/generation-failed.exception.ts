import { BadGatewayException } from '@nestjs/common';

/**
 * The generative model could not produce usable output. Nothing was persisted
 * and the same request may be retried.
 */
export class GenerationFailedException extends BadGatewayException {
  constructor(message = 'Content generation failed. Please try again.') {
    super(message);
  }
}
