import type { Metadata } from "next";
import { SiteShell } from "@/components/site-shell";
import "./globals.css";

export const metadata: Metadata = {
  title: "Wx Brief",
  description:
    "METAR/TAF, DATIS and FAA airport status for your departure, arrival and alternate in one briefing.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body
        className="min-h-screen bg-gradient-to-b from-sky-50 to-slate-100 text-slate-800 antialiased"
        style={{ fontFamily: "system-ui, -apple-system, sans-serif" }}
      >
        <SiteShell>{children}</SiteShell>
      </body>
    </html>
  );
}
