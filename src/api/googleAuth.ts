import { promises as fs } from "fs";
import { OAuth2Client } from "google-auth-library";
import { z } from "zod";

import { AuthenticationError } from "../errors";
import logger from "../services/logger";

const TokenSchema = z.object({
	type: z.literal("authorized_user").optional(),
	client_id: z.string().min(1),
	client_secret: z.string().min(1),
	refresh_token: z.string().min(1),
});

/**
 * Reads previously authorized credentials from the token file.
 * Obtaining the token in the first place happens outside this tool.
 */
export async function authorize(tokenPath: string): Promise<OAuth2Client> {
	let raw: unknown;
	try {
		raw = JSON.parse(await fs.readFile(tokenPath, "utf-8"));
	} catch (err) {
		logger.error(`Authentication failed: Could not load token from '${tokenPath}'.`);
		throw new AuthenticationError(`No usable token at ${tokenPath}`, { cause: err });
	}

	const token = TokenSchema.safeParse(raw);
	if (!token.success) {
		logger.error(`Authentication failed: '${tokenPath}' is not an authorized-user token.`);
		throw new AuthenticationError(`Invalid token file format: ${tokenPath}`);
	}

	const client = new OAuth2Client(token.data.client_id, token.data.client_secret);
	client.setCredentials({ refresh_token: token.data.refresh_token });
	return client;
}
