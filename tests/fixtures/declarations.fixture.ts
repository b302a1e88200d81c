// tests/fixtures/declarations.fixture.ts

/** Users, items and a search endpoint, covering every parameter kind. */
export const userApiDeclaration = `
// user service
UserApi, {
    { path: "/users", method: GET, res: User[] },
    { path: "/users/{id}", method: GET, path_params: UserPath, res: User },
    { path: "/users", method: POST, fn_name: create_user, req: NewUser, res: User },
    {
        path: "/users/{id}",
        method: PUT,
        path_params: UserPath,
        req: NewUser,
        headers: Record<string, string>,
        res: User,
    },
    { path: "/users/{id}", method: DELETE, path_params: UserPath, res: DeleteResult },
    { path: "/search", method: GET, query_params: SearchQuery, res: Page<User> },
}
`;

/** The models the user service refers to. Used as a type registry. */
export const userModels = `
export interface User { id: number; name: string; }
export interface NewUser { name: string; }
export interface UserPath { id: number | string; }
export interface DeleteResult { deleted: boolean; }
export interface SearchQuery { q?: string; tags?: string[]; since?: Date; limit?: number; }
export type Page<T> = { items: T[]; total: number };
`;

export const itemApiYaml = `
name: ItemApi
endpoints:
  - path: /items
    method: get
    res: Item[]
  - path: /items/{item_id}
    method: DELETE
    path_params: "{ item_id: string }"
    res: "{ ok: boolean }"
`;
