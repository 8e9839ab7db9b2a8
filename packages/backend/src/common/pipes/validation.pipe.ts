import {
  PipeTransform,
  Injectable,
  ArgumentMetadata,
  BadRequestException,
  Logger,
  Type
} from '@nestjs/common';
import { validateSync, ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';

const PRIMITIVES: ReadonlyArray<Type<unknown>> = [String, Boolean, Number, Array, Object];

function collectMessages(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap(err => {
    const path = `${prefix}${err.property}`;
    const own = err.constraints ? Object.values(err.constraints) : [];
    return [...own, ...collectMessages(err.children ?? [], `${path}.`)];
  });
}

/**
 * Turns a plain payload into a validated instance of `metatype`.
 * Shared by the HTTP pipe and the Kafka consumers.
 */
export function validatePayload<T extends object>(metatype: Type<T>, value: unknown): T {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new BadRequestException({
      message: 'Validation failed',
      errors: ['payload must be an object']
    });
  }

  const instance = plainToInstance(metatype, value);
  const errors = validateSync(instance, { whitelist: true });
  if (errors.length > 0) {
    throw new BadRequestException({
      message: 'Validation failed',
      errors: collectMessages(errors)
    });
  }
  return instance;
}

@Injectable()
export class ValidationPipe implements PipeTransform<unknown> {
  private readonly logger = new Logger(ValidationPipe.name);

  transform(value: unknown, { metatype }: ArgumentMetadata): unknown {
    if (!metatype || PRIMITIVES.includes(metatype)) {
      return value;
    }

    try {
      return validatePayload(metatype, value);
    } catch (error) {
      if (error instanceof BadRequestException) {
        this.logger.warn(`Validation failed: ${JSON.stringify(error.getResponse())}`);
      }
      throw error;
    }
  }
}
