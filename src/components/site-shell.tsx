import { Header } from "@/components/header";
import { Footer } from "@/components/footer";

/**
 * Page chrome around every route, with a skip link past the header
 */
export function SiteShell({ children }: { children: React.ReactNode }) {
  return (
    <div className="flex min-h-screen flex-col">
      <a
        href="#briefing"
        className="sr-only focus:not-sr-only focus:absolute focus:left-4 focus:top-4 focus:z-[60] focus:rounded-md focus:bg-white focus:px-3 focus:py-2 focus:text-sm focus:font-medium focus:text-sky-700 focus:shadow"
      >
        Skip to briefing
      </a>
      <Header />
      <main id="briefing" aria-label="Weather briefing" className="flex-1">
        {children}
      </main>
      <Footer />
    </div>
  );
}
