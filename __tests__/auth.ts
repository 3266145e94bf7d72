import { FastifyInstance } from 'fastify';
import request from 'supertest';
import { DataSource } from 'typeorm';
import appFunc from '../src';
import createOrGetConnection from '../src/db';
import { signJwt, verifyJwt } from '../src/auth';
import { User } from '../src/entity';
import { saveFixtures } from './helpers';
import { usersFixture } from './fixture/user';

let app: FastifyInstance;
let con: DataSource;

const MUTATION = `
  mutation {
    createSnippet(input: { code: "print(1)" }) {
      owner {
        username
      }
    }
  }
`;

beforeAll(async () => {
  con = await createOrGetConnection();
  app = await appFunc();
  return app.ready();
});

afterAll(() => app.close());

beforeEach(async () => {
  await saveFixtures(con, User, usersFixture);
});

describe('jwt', () => {
  it('should verify a signed token', async () => {
    const { token, expiresIn } = await signJwt({ userId: '1' });
    const payload = await verifyJwt(token);

    expect(payload?.userId).toEqual('1');
    expect(payload?.exp).toEqual(Math.floor(expiresIn.getTime() / 1000));
  });

  it('should reject a malformed token', async () => {
    await expect(verifyJwt('not-a-token')).rejects.toThrow();
  });
});

describe('authentication plugin', () => {
  it('should authenticate with a bearer token', async () => {
    const { token } = await signJwt({ userId: '2' });
    const res = await request(app.server)
      .post('/graphql')
      .set('authorization', `Bearer ${token}`)
      .send({ query: MUTATION })
      .expect(200);

    expect(res.body.errors).toBeFalsy();
    expect(res.body.data).toEqual({
      createSnippet: { owner: { username: 'bob' } },
    });
  });

  it('should leave the request anonymous with an invalid token', async () => {
    const res = await request(app.server)
      .post('/graphql')
      .set('authorization', 'Bearer not-a-token')
      .send({ query: MUTATION })
      .expect(200);

    expect(res.body.errors[0].extensions.code).toEqual('UNAUTHENTICATED');
  });

  it('should ignore the user headers without the service secret', async () => {
    const res = await request(app.server)
      .post('/graphql')
      .set('authorization', 'Service wrong-secret')
      .set('user-id', '1')
      .set('logged-in', 'true')
      .send({ query: MUTATION })
      .expect(200);

    expect(res.body.errors[0].extensions.code).toEqual('UNAUTHENTICATED');
  });

  it('should not trust the user id of a service that is not logged in', async () => {
    const res = await request(app.server)
      .post('/graphql')
      .set('authorization', `Service ${process.env.ACCESS_SECRET}`)
      .set('user-id', '1')
      .send({ query: MUTATION })
      .expect(200);

    expect(res.body.errors[0].extensions.code).toEqual('UNAUTHENTICATED');
  });
});
