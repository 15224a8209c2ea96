import { describe, it, expect } from 'vitest';
import { describeGroupMembers } from '../src/admin/group-members.js';
import {
  describeRepositoryProperties,
  setRepositoryProperty,
} from '../src/admin/repo-properties.js';
import { createMemoryLogger } from '../src/utils/logger.js';
import { makeAccessClient } from './helpers/platform-fakes.js';

describe('describeGroupMembers', () => {
  it('prints the members on one quoted line', async () => {
    const client = makeAccessClient({ groups: { 'web-manage': ['alice', 'bob'] } });
    expect(await describeGroupMembers(client, 'web-manage')).toBe('"alice","bob"');
  });

  it('rejects for an unknown group', async () => {
    const client = makeAccessClient({});
    await expect(describeGroupMembers(client, 'ghost-manage')).rejects.toThrow(
      'ghost-manage not found',
    );
  });
});

describe('describeRepositoryProperties', () => {
  it('lists the first value of every property', async () => {
    const client = makeAccessClient({
      properties: { 'docker-local': { owner: ['team-a', 'team-b'], tier: ['gold'] } },
    });

    expect(await describeRepositoryProperties(client, 'docker-local')).toBe(
      '"owner","team-a"\n"tier","gold"\n',
    );
  });
});

describe('setRepositoryProperty', () => {
  it('sets the property and logs progress', async () => {
    const client = makeAccessClient({});
    const { logger, lines } = createMemoryLogger();

    await setRepositoryProperty(client, 'docker-local', 'owner', 'team-a', logger);

    expect(client.calls).toEqual(['set-property:docker-local:owner=team-a']);
    expect(lines.map((l) => l.line)).toEqual([
      "Setting property 'owner=team-a' on repository 'docker-local'...",
      "Property successfully set on repository 'docker-local'.",
    ]);
  });
});
