import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AcmeConfig } from './acme.config';
import { AcmeAuthorizationEvent } from './acme-authorization.event';
import { AuthorizationListener } from './authorization.listener';

jest.mock('axios', () => ({
  __esModule: true,
  default: { post: jest.fn() },
}));

jest.mock('../db/client', () => ({
  db: { insert: jest.fn() },
}));

import { db } from '../db/client';

describe('AuthorizationListener', () => {
  let listener: AuthorizationListener;
  let values: jest.Mock;
  let post: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    values = jest.fn().mockResolvedValue(undefined);
    (db.insert as jest.Mock).mockReturnValue({ values });
    post = axios.post as jest.Mock;
    post.mockResolvedValue({ status: 200 });
    listener = new AuthorizationListener(
      new AcmeConfig(new ConfigService({ ACME_USER_AGENT: 'acme-test/1.0' })),
    );
  });

  it('should record the token without calling a webhook when none is set', async () => {
    await listener.handleAuthorization(new AcmeAuthorizationEvent(1, 'a.example.com', 'tok', 'key-auth', ''));

    expect(values).toHaveBeenCalledWith({
      taskId: 1,
      domain: 'a.example.com',
      token: 'tok',
      key: 'key-auth',
    });
    expect(post).not.toHaveBeenCalled();
  });

  it('should notify the webhook after recording the token', async () => {
    await listener.handleAuthorization(
      new AcmeAuthorizationEvent(1, 'a.example.com', 'tok', 'key-auth', 'https://hooks.example.com/acme'),
    );

    expect(values).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(
      'https://hooks.example.com/acme',
      { domain: 'a.example.com', token: 'tok', key: 'key-auth' },
      {
        timeout: 10_000,
        headers: { 'Content-Type': 'application/json', 'User-Agent': 'acme-test/1.0' },
      },
    );
  });

  it('should not fail the authorization when the webhook is down', async () => {
    post.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(
      listener.handleAuthorization(
        new AcmeAuthorizationEvent(1, 'a.example.com', 'tok', 'key-auth', 'https://hooks.example.com/acme'),
      ),
    ).resolves.toBeUndefined();
  });

  it('should propagate failures to record the token', async () => {
    values.mockRejectedValue(new Error('insert failed'));

    await expect(
      listener.handleAuthorization(
        new AcmeAuthorizationEvent(1, 'a.example.com', 'tok', 'key-auth', 'https://hooks.example.com/acme'),
      ),
    ).rejects.toThrow('insert failed');
    expect(post).not.toHaveBeenCalled();
  });
});
