import { merge } from 'lodash';
import { makeExecutableSchema } from '@graphql-tools/schema';

import * as common from './schema/common';
import * as snippets from './schema/snippets';
import * as users from './schema/users';
import * as authDirective from './directive/auth';

export const schema = authDirective.transformer(
  makeExecutableSchema({
    typeDefs: [
      common.typeDefs,
      authDirective.typeDefs,
      snippets.typeDefs,
      users.typeDefs,
    ],
    resolvers: merge(common.resolvers, snippets.resolvers, users.resolvers),
  }),
);
