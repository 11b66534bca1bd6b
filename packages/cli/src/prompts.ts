import inquirer from "inquirer";
import type { Profile, ProfileName } from "@gitswitch/core";

export interface InputOptions {
    default?: string;
    /** Returns true to accept, or the message to show before asking again */
    validate?: (value: string) => true | string;
}

/**
 * Interactive questions asked by the commands.
 */
export interface Prompter {
    input(message: string, options?: InputOptions): Promise<string>;
    confirm(message: string, defaultValue: boolean): Promise<boolean>;
    selectProfile(message: string, profiles: Profile[]): Promise<ProfileName>;
}

export function profileChoiceLabel(profile: Profile): string {
    const email = profile.gitUserEmail || "<email not set>";
    return `${profile.displayName.toUpperCase()} - ${email}`;
}

export function createInquirerPrompter(): Prompter {
    return {
        async input(message, options = {}) {
            const answers = await inquirer.prompt<{ value: string }>([
                {
                    type: "input",
                    name: "value",
                    message,
                    default: options.default,
                    validate: options.validate,
                },
            ]);
            return answers.value;
        },

        async confirm(message, defaultValue) {
            const answers = await inquirer.prompt<{ confirmed: boolean }>([
                {
                    type: "confirm",
                    name: "confirmed",
                    message,
                    default: defaultValue,
                },
            ]);
            return answers.confirmed;
        },

        async selectProfile(message, profiles) {
            const answers = await inquirer.prompt<{ profile: ProfileName }>([
                {
                    type: "list",
                    name: "profile",
                    message,
                    choices: profiles.map((profile) => ({
                        name: profileChoiceLabel(profile),
                        value: profile.name,
                    })),
                },
            ]);
            return answers.profile;
        },
    };
}
