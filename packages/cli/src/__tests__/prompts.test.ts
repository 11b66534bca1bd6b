import { createDefaultProfiles } from "@gitswitch/core";
import { profileChoiceLabel } from "../prompts";

describe("profileChoiceLabel", () => {
    it("shows the account and its email", () => {
        const profiles = createDefaultProfiles("/keys", {
            work: { gitUserName: "Jane", gitUserEmail: "jane@corp.example.com" },
        });

        expect(profileChoiceLabel(profiles.work)).toBe("WORK - jane@corp.example.com");
        expect(profileChoiceLabel(profiles.personal)).toBe("PERSONAL - <email not set>");
    });
});
