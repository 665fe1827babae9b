import type { NextAuthOptions, Session } from "next-auth";
import { getServerSession } from "next-auth";
import Google from "next-auth/providers/google";
import type { JWT } from "next-auth/jwt";
import { query } from "./db";

export const authOptions = {
  session: { strategy: "jwt" },
  providers: [
    Google({
      clientId: process.env.GOOGLE_CLIENT_ID ?? "",
      clientSecret: process.env.GOOGLE_CLIENT_SECRET ?? "",
    }),
  ],
  callbacks: {
    async signIn({ user }) {
      const email = user.email?.trim().toLowerCase();
      if (!email) {
        console.warn("Blocked sign-in attempt without an email address");
        return false;
      }
      return true;
    },
    async session({ session, token }: { session: Session; token: JWT }) {
      if (session.user && token.sub) {
        session.user.id = token.sub;
      }
      return session;
    },
  },
  secret: process.env.AUTH_SECRET,
} satisfies NextAuthOptions;

type SessionUser = NonNullable<Session["user"]> & { id: string };

export async function getCurrentUser(): Promise<SessionUser | null> {
  const session = await getServerSession(authOptions);
  if (!session?.user?.id) {
    return null;
  }

  const user = session.user;
  try {
    await query(
      `INSERT INTO users (id, email, name, image)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO NOTHING`,
      [user.id, user.email ?? null, user.name ?? null, user.image ?? null]
    );
  } catch (error) {
    console.error("Failed to ensure user exists", error);
    return null;
  }

  return user;
}
