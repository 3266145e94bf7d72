import '../src/config';
import { parseArgs } from 'node:util';
import createOrGetConnection from '../src/db';
import { User } from '../src/entity';
import { generateUUID } from '../src/ids';
import { signJwt } from '../src/auth';

const start = async (): Promise<void> => {
  const { values } = parseArgs({
    options: {
      username: { type: 'string', short: 'u' },
      name: { type: 'string', short: 'n' },
    },
  });

  const username = values.username;
  if (!username) {
    throw new Error('--username (-u) is required');
  }

  const con = await createOrGetConnection();
  const repo = con.getRepository(User);
  if (await repo.findOneBy({ username })) {
    throw new Error(`User ${username} already exists`);
  }

  const user = await repo.save(
    repo.create({
      id: generateUUID(),
      username,
      name: values.name ?? null,
    }),
  );
  console.log(`Created user ${user.username} (${user.id})`);

  const { token, expiresIn } = await signJwt({ userId: user.id });
  console.log(`Access token (expires ${expiresIn.toISOString()}):`);
  console.log(token);
  await con.destroy();
};

start()
  .then(() => {
    console.log('done');
    process.exit();
  })
  .catch((err) => {
    console.error(err);
    process.exit(-1);
  });
