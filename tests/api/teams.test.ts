import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';

import { createTestContext, signUp, type TestContext } from '../helpers';

describe('team routes', () => {
    let ctx: TestContext;
    let ash: { Authorization: string };
    let misty: { Authorization: string };

    beforeEach(async () => {
        ctx = await createTestContext();
        ash = await signUp(ctx.app, 'ash');
        misty = await signUp(ctx.app, 'misty');
        for (const pokemonId of [1, 4, 7, 25]) {
            await request(ctx.app).post('/api/v1/pokedex').set(ash).send({ pokemonId }).expect(201);
        }
    });

    it('creates, reads and lists teams', async () => {
        const created = await request(ctx.app)
            .post('/api/v1/teams')
            .set(ash)
            .send({ name: 'Starters', description: 'Kanto picks', pokemonIds: [4, 1, 7] })
            .expect(201);

        expect(created.body).toMatchObject({ id: 1, name: 'Starters', description: 'Kanto picks' });
        expect(created.body.members.map((member: { pokemonName: string }) => member.pokemonName)).toEqual([
            'charmander',
            'bulbasaur',
            'squirtle',
        ]);

        const list = await request(ctx.app).get('/api/v1/teams').set(ash).expect(200);
        expect(list.body).toHaveLength(1);
        await request(ctx.app).get('/api/v1/teams/1').set(ash).expect(200);
    });

    it('rejects a seventh member and duplicates', async () => {
        const tooMany = await request(ctx.app)
            .post('/api/v1/teams')
            .set(ash)
            .send({ name: 'Big', pokemonIds: [1, 4, 7, 25, 26, 150, 151] })
            .expect(400);
        expect(tooMany.body.details).toEqual([{ path: 'pokemonIds', message: 'Team cannot have more than 6 Pokémon' }]);

        await request(ctx.app).post('/api/v1/teams').set(ash).send({ name: 'Twins', pokemonIds: [1, 1] }).expect(400);
    });

    it('rejects species ids beyond the integer column range', async () => {
        const res = await request(ctx.app)
            .post('/api/v1/teams')
            .set(ash)
            .send({ name: 'Overflow', pokemonIds: [1, 3000000000] })
            .expect(400);

        expect(res.body.details.map((detail: { path: string }) => detail.path)).toEqual(['pokemonIds.1']);
        await request(ctx.app).get('/api/v1/teams/3000000000').set(ash).expect(400);
    });

    it('rejects species outside the caller\'s Pokédex', async () => {
        const res = await request(ctx.app)
            .post('/api/v1/teams')
            .set(misty)
            .send({ name: 'Borrowed', pokemonIds: [25] })
            .expect(400);

        expect(res.body).toEqual({ error: 'Pokemon with id 25 is not in your Pokedex', code: 'VALIDATION_FAILED' });
    });

    it('keeps teams private to their owner', async () => {
        await request(ctx.app).post('/api/v1/teams').set(ash).send({ name: 'Starters', pokemonIds: [1] }).expect(201);

        await request(ctx.app).get('/api/v1/teams/1').set(misty).expect(404);
        await request(ctx.app).patch('/api/v1/teams/1').set(misty).send({ name: 'Mine' }).expect(404);
        await request(ctx.app).delete('/api/v1/teams/1').set(misty).expect(404);
        await request(ctx.app).get('/api/v1/teams/1/export').set(misty).expect(404);
        const list = await request(ctx.app).get('/api/v1/teams').set(misty).expect(200);
        expect(list.body).toEqual([]);
    });

    it('updates and deletes a team', async () => {
        await request(ctx.app).post('/api/v1/teams').set(ash).send({ name: 'Starters', pokemonIds: [1] }).expect(201);

        const updated = await request(ctx.app)
            .put('/api/v1/teams/1')
            .set(ash)
            .send({ name: 'Sparks', pokemonIds: [25] })
            .expect(200);
        expect(updated.body.name).toBe('Sparks');
        expect(updated.body.members.map((member: { pokemonId: number }) => member.pokemonId)).toEqual([25]);

        await request(ctx.app).delete('/api/v1/teams/1').set(ash).expect(204);
        await request(ctx.app).get('/api/v1/teams/1').set(ash).expect(404);
    });

    it('exports a team as PDF', async () => {
        await request(ctx.app).post('/api/v1/teams').set(ash).send({ name: 'Red Team', pokemonIds: [4] }).expect(201);

        const res = await request(ctx.app).get('/api/v1/teams/1/export').set(ash).responseType('blob').expect(200);

        expect(res.headers['content-type']).toBe('application/pdf');
        expect(res.headers['content-disposition']).toBe('attachment; filename="team-1-Red_Team.pdf"');
    });
});
