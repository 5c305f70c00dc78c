import { BriefingPlanner } from "@/components/briefing-planner";

export default function BriefingPage() {
  return (
    <div className="mx-auto max-w-5xl px-4 py-8">
      <div className="mb-8 text-center">
        <h1 className="text-3xl font-bold tracking-tight sm:text-4xl">
          Weather Briefing
        </h1>
        <p className="mx-auto mt-3 max-w-xl text-lg text-slate-500">
          METAR, TAF, DATIS and airport status for your route, colour-coded
          by flight category.
        </p>
      </div>

      <div className="rounded-xl border border-slate-200/50 bg-white/90 p-6 backdrop-blur-sm">
        <BriefingPlanner />
      </div>
    </div>
  );
}
