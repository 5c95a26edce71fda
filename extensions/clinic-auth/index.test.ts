import { describe, expect, it } from "vitest";

import { listAuditLogs } from "../../src/audit/logger.ts";
import { isCurrentRefreshToken, setRefreshToken } from "../../src/repositories/users.ts";
import { addUser, signIn, useTestApp } from "../../src/testing/fixtures.ts";

describe("clinic-auth plugin", () => {
  const app = useTestApp();

  it("logs in with a trimmed username and returns the role's screens", async () => {
    await addUser("frontdesk", "receptionist", "desk-pass-1");
    const result = await app().gateway.call("auth.login", { username: " frontdesk ", password: "desk-pass-1" }, null);

    expect(result).toMatchObject({
      user: { username: "frontdesk", role: "receptionist" },
      subtitle: "Patient Management & Scheduling",
      navigation: [
        { screen: "dashboard", label: "Dashboard" },
        { screen: "patients", label: "Patients" },
        { screen: "appointments", label: "Appointments" },
        { screen: "billing", label: "Billing" },
      ],
    });
    expect(result).not.toHaveProperty("user.passwordHash");
    expect(listAuditLogs()).toEqual([
      expect.objectContaining({ action: "login", resourceType: "user", operatorName: "frontdesk" }),
    ]);
  });

  it("refuses a wrong password without auditing a login", async () => {
    await addUser("frontdesk", "receptionist", "desk-pass-1");
    await expect(
      app().gateway.call("auth.login", { username: "frontdesk", password: "nope" }, null),
    ).rejects.toThrow("Invalid username or password");
    expect(listAuditLogs()).toEqual([]);
  });

  it("shows a dentist only the dashboard and treatments", async () => {
    const session = await signIn("drlee", "dentist");
    await expect(app().gateway.call("auth.navigation", {}, session)).resolves.toEqual({
      role: "dentist",
      navigation: [
        { screen: "dashboard", label: "Dashboard" },
        { screen: "treatments", label: "Treatments" },
      ],
    });
    await expect(app().gateway.call("auth.me", {}, session)).resolves.toMatchObject({
      user: { username: "drlee" },
      subtitle: "Patient Care & Treatment",
    });
  });

  it("changes the password only with the current one", async () => {
    const session = await signIn("drlee", "dentist");
    const { gateway } = app();

    await expect(
      gateway.call("auth.changePassword", { currentPassword: "wrong", newPassword: "chair-side-2" }, session),
    ).rejects.toThrow("Current password is incorrect");
    await expect(
      gateway.call("auth.changePassword", { currentPassword: "password1", newPassword: "chair-side-2" }, session),
    ).resolves.toEqual({ userId: session.userId, changed: true });

    await expect(
      gateway.call("auth.login", { username: "drlee", password: "chair-side-2" }, null),
    ).resolves.toMatchObject({ user: { id: session.userId } });
  });

  it("revokes the refresh token on logout", async () => {
    const session = await signIn("drlee", "dentist");
    setRefreshToken(session.userId, "refresh-a");

    await expect(app().gateway.call("auth.logout", {}, session)).resolves.toEqual({
      userId: session.userId,
      loggedOut: true,
    });
    expect(isCurrentRefreshToken(session.userId, "refresh-a")).toBe(false);
    expect(listAuditLogs({ resourceType: "user" }).map((e) => e.action)).toEqual(["logout"]);
  });
});
