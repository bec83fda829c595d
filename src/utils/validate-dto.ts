import { BadRequestException, HttpStatus } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';

type ValidationErrorTree = { [property: string]: string | ValidationErrorTree };

export function generateErrors(errors: ValidationError[]): ValidationErrorTree {
  return errors.reduce<ValidationErrorTree>(
    (accumulator, currentValue) => ({
      ...accumulator,
      [currentValue.property]:
        (currentValue.children?.length ?? 0) > 0
          ? generateErrors(currentValue.children ?? [])
          : Object.values(currentValue.constraints ?? {}).join(', '),
    }),
    {},
  );
}

/**
 * Transform and validate a plain payload against a DTO class.
 * Callers reach services directly (no HTTP pipe), so the check runs here.
 *
 * @throws BadRequestException with a per-property error tree
 */
export async function validateDto<T extends object>(
  dtoClass: ClassConstructor<T>,
  payload: unknown,
): Promise<T> {
  const instance = plainToInstance(dtoClass, payload);
  const errors = await validate(instance, {
    whitelist: true,
    forbidUnknownValues: true,
  });

  if (errors.length > 0) {
    throw new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: generateErrors(errors),
    });
  }

  return instance;
}
