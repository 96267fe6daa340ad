export type ProfileData = Record<string, unknown>;

export interface Profile {
    name: string;
    data: ProfileData;
    createdAt: string;
    updatedAt: string;
}
