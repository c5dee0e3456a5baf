import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
  actorHeader: (process.env.ACTOR_HEADER || 'x-remote-user').toLowerCase(),
}));
