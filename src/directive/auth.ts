import { AuthenticationError } from 'apollo-server-errors';
import { defaultFieldResolver, GraphQLSchema } from 'graphql';
import { mapSchema, getDirective, MapperKind } from '@graphql-tools/utils';
import { Context } from '../Context';

const directiveName = 'auth';

export const typeDefs = /* GraphQL */ `
"""
Requires an authenticated user, anonymous requests are rejected
"""
directive @${directiveName} on OBJECT | FIELD_DEFINITION
`;

export const transformer = (schema: GraphQLSchema): GraphQLSchema => {
  const protectedTypes = new Set<string>();
  return mapSchema(schema, {
    [MapperKind.TYPE]: (type) => {
      if (getDirective(schema, type, directiveName)?.[0]) {
        protectedTypes.add(type.name);
      }
      return undefined;
    },
    [MapperKind.OBJECT_FIELD]: (fieldConfig, _fieldName, typeName) => {
      const isProtected =
        !!getDirective(schema, fieldConfig, directiveName)?.[0] ||
        protectedTypes.has(typeName);
      if (!isProtected) {
        return fieldConfig;
      }
      const { resolve = defaultFieldResolver } = fieldConfig;
      return {
        ...fieldConfig,
        resolve: (source, args, ctx: Context, info) => {
          if (!ctx.userId) {
            if (['Query', 'Mutation'].includes(typeName)) {
              throw new AuthenticationError(
                'Access denied! You need to be authorized to perform this action!',
              );
            }
            return null;
          }
          return resolve(source, args, ctx, info);
        },
      };
    },
  });
};
