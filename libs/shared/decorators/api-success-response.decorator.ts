import { applyDecorators, Type } from '@nestjs/common';
import { ApiExtraModels, ApiOkResponse, getSchemaPath } from '@nestjs/swagger';
import { SuccessResponseRto } from '@shared/response.rto';

type ApiSuccessResponseOptions = {
	isArray?: boolean;
	description?: string;
};

/** Documents a `{ success: true, data }` envelope around the given model. */
export const ApiSuccessResponse = <TModel extends Type<unknown>>(
	model: TModel,
	options: ApiSuccessResponseOptions = {},
) => {
	const { isArray = false, description } = options;

	return applyDecorators(
		ApiExtraModels(SuccessResponseRto, model),
		ApiOkResponse({
			description,
			schema: {
				allOf: [
					{ $ref: getSchemaPath(SuccessResponseRto) },
					{
						properties: {
							data: isArray
								? {
										type: 'array',
										items: { $ref: getSchemaPath(model) },
									}
								: { $ref: getSchemaPath(model) },
						},
					},
				],
			},
		}),
	);
};
