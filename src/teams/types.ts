export const MAX_TEAM_SIZE = 6;

export interface TeamMember {
    position: number;
    pokedexEntryId: number;
    pokemonId: number;
    pokemonName: string;
    pokemonSprite: string | null;
}

export interface Team {
    id: number;
    ownerId: number;
    name: string;
    description: string | null;
    createdAt: Date;
    members: TeamMember[];
}

export type TeamRecord = Omit<Team, 'members'>;
