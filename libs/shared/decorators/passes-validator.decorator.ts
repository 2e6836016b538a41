import { ValidateBy, ValidationArguments, ValidationOptions } from 'class-validator';
import type { ValidationResult } from '@shared/validators/input.validators';

type InputValidator = (raw: string) => ValidationResult<unknown>;

/** Checks a string property with one of the bot's input validators and reports its error text. */
export const PassesValidator = (validator: InputValidator, options?: ValidationOptions): PropertyDecorator =>
	ValidateBy(
		{
			name: 'passesValidator',
			validator: {
				validate: (value: unknown) => typeof value === 'string' && validator(value).ok,
				defaultMessage: (args?: ValidationArguments) => {
					if (typeof args?.value !== 'string') {
						return '$property must be a string';
					}
					const result = validator(args.value);
					return result.ok ? '$property is invalid' : result.error;
				},
			},
		},
		options,
	);
