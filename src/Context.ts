import './types';
import {
  DataSource,
  EntitySchema,
  ObjectLiteral,
  ObjectType,
  Repository,
} from 'typeorm';
import { FastifyRequest, FastifyBaseLogger } from 'fastify';

export class Context {
  req: FastifyRequest;
  con: DataSource;

  constructor(req: FastifyRequest, con: DataSource) {
    this.req = req;
    this.con = con;
  }

  get userId(): string | undefined {
    return this.req.userId;
  }

  get log(): FastifyBaseLogger {
    return this.req.log;
  }

  getRepository<Entity extends ObjectLiteral>(
    target: ObjectType<Entity> | EntitySchema<Entity> | string,
  ): Repository<Entity> {
    return this.con.getRepository(target);
  }
}

export type BaseContext = Omit<Context, 'userId'>;

export type AuthContext = BaseContext & {
  userId: string;
};
