import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Identity } from '../../src/auth/types';
import { PokedexRepository } from '../../src/db/pokedex-repo';
import { TeamRepository } from '../../src/db/team-repo';
import { UserRepository } from '../../src/db/user-repo';
import { NotFoundError, ValidationError } from '../../src/errors';
import { PokedexService } from '../../src/pokedex/service';
import { CreateTeamSchema } from '../../src/schemas/teams';
import { TeamService } from '../../src/teams/service';
import { createTestDatabase, FakeSpeciesGateway } from '../helpers';

async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected the promise to reject');
}

describe('TeamService', () => {
    let pokedex: PokedexService;
    let teams: TeamService;
    let ash: Identity;
    let misty: Identity;

    beforeEach(async () => {
        const database = await createTestDatabase();
        const users = new UserRepository(database);
        const entries = new PokedexRepository(database);
        pokedex = new PokedexService(entries, new FakeSpeciesGateway());
        teams = new TeamService(database);

        const ashAccount = await users.create({ username: 'ash', passwordHash: 'hash' });
        const mistyAccount = await users.create({ username: 'misty', passwordHash: 'hash' });
        ash = { userId: ashAccount.id, username: 'ash' };
        misty = { userId: mistyAccount.id, username: 'misty' };

        for (const pokemonId of [1, 4, 7, 25]) {
            await pokedex.create(ash, { pokemonId, isCaptured: true, favorite: false });
        }
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('creates a team with members in the given order', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [25, 4, 1] });

        expect(team).toMatchObject({ ownerId: ash.userId, name: 'Starters', description: null });
        expect(team.members.map((member) => [member.position, member.pokemonId, member.pokemonName])).toEqual([
            [1, 25, 'pikachu'],
            [2, 4, 'charmander'],
            [3, 1, 'bulbasaur'],
        ]);
    });

    it('refuses species that are not in the caller\'s Pokédex', async () => {
        await pokedex.create(misty, { pokemonId: 26, isCaptured: true, favorite: false });

        const error = await rejection(teams.create(ash, { name: 'Borrowed', pokemonIds: [25, 26] }));

        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ statusCode: 400, message: 'Pokemon with id 26 is not in your Pokedex' });
        expect(await teams.list(ash)).toEqual([]);
    });

    it('replaces the roster on update and keeps it otherwise', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [1, 4] });

        const renamed = await teams.update(ash, team.id, { name: 'Kanto', description: 'first picks' });
        expect(renamed.members.map((member) => member.pokemonId)).toEqual([1, 4]);
        expect(renamed).toMatchObject({ name: 'Kanto', description: 'first picks' });

        const reshuffled = await teams.update(ash, team.id, { pokemonIds: [7] });
        expect(reshuffled.name).toBe('Kanto');
        expect(reshuffled.members.map((member) => member.pokemonId)).toEqual([7]);
    });

    it('drops a member when its Pokédex entry is deleted', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [1, 4] });
        const bulbasaur = (await pokedex.listAll(ash)).find((entry) => entry.pokemonId === 1);
        if (!bulbasaur) throw new Error('fixture entry missing');

        await pokedex.delete(ash, bulbasaur.id);

        expect((await teams.get(ash, team.id)).members.map((member) => member.pokemonId)).toEqual([4]);
    });

    it('leaves no team behind when writing its members fails', async () => {
        const replace = vi
            .spyOn(TeamRepository.prototype, 'replaceMembers')
            .mockRejectedValueOnce(new Error('member insert failed'));

        await expect(teams.create(ash, { name: 'Starters', pokemonIds: [1, 4] })).rejects.toThrow('member insert failed');

        expect(replace).toHaveBeenCalledTimes(1);
        expect(await teams.list(ash)).toEqual([]);
    });

    it('keeps the previous name and roster when an update fails part way', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [1, 4] });
        vi.spyOn(TeamRepository.prototype, 'replaceMembers').mockRejectedValueOnce(new Error('member insert failed'));

        await expect(teams.update(ash, team.id, { name: 'Renamed', pokemonIds: [7] })).rejects.toThrow(
            'member insert failed'
        );

        const current = await teams.get(ash, team.id);
        expect(current.name).toBe('Starters');
        expect(current.members.map((member) => member.pokemonId)).toEqual([1, 4]);
    });

    it('hides another owner\'s team', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [1] });

        expect(await rejection(teams.get(misty, team.id))).toBeInstanceOf(NotFoundError);
        expect(await rejection(teams.update(misty, team.id, { name: 'Mine' }))).toMatchObject({ message: 'Team not found' });
        expect(await rejection(teams.delete(misty, team.id))).toMatchObject({ statusCode: 404 });
        expect(await teams.list(misty)).toEqual([]);
        expect((await teams.get(ash, team.id)).name).toBe('Starters');
    });

    it('deletes a team with its members', async () => {
        const team = await teams.create(ash, { name: 'Starters', pokemonIds: [1, 4] });

        await teams.delete(ash, team.id);

        expect(await teams.list(ash)).toEqual([]);
        expect(await rejection(teams.get(ash, team.id))).toBeInstanceOf(NotFoundError);
    });
});

describe('CreateTeamSchema', () => {
    it('caps a team at six members', () => {
        const result = CreateTeamSchema.safeParse({ name: 'Too many', pokemonIds: [1, 2, 3, 4, 5, 6, 7] });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].message).toBe('Team cannot have more than 6 Pokémon');
        }
    });

    it('rejects empty and repeated rosters', () => {
        expect(CreateTeamSchema.safeParse({ name: 'Empty', pokemonIds: [] }).success).toBe(false);
        expect(CreateTeamSchema.safeParse({ name: 'Twins', pokemonIds: [25, 25] }).success).toBe(false);
    });

    it('accepts a full team', () => {
        const result = CreateTeamSchema.safeParse({ name: ' Full ', pokemonIds: [1, 2, 3, 4, 5, 6] });
        expect(result.success && result.data.name).toBe('Full');
    });
});
