export function Footer() {
  return (
    <footer className="border-t border-white/20 bg-white/30 backdrop-blur-sm">
      <div className="mx-auto max-w-5xl px-4 sm:px-6 py-6">
        <p className="text-center text-sm text-slate-500">
          Data from aviationweather.gov, the DATIS relay and FAA airport
          status. Not for operational use.
        </p>
      </div>
    </footer>
  );
}
