import React, { createContext, useContext, useState } from "react";
import { useStore } from "zustand";
import { createConsultationStore } from "./consultationStore";
import type { ConsultationStore, ConsultationStoreApi, SessionDependencies } from "./consultationStore";

const SessionContext = createContext<ConsultationStoreApi | null>(null);

type SessionProviderProps = React.PropsWithChildren<{
  deps: SessionDependencies;
  store?: ConsultationStoreApi;
}>;

/** Mount with `key` set to the user so a new sign-in starts a fresh session. */
export function SessionProvider({ deps, store, children }: SessionProviderProps) {
  const [session] = useState(() => store ?? createConsultationStore(deps));
  return <SessionContext.Provider value={session}>{children}</SessionContext.Provider>;
}

export function useConsultationStore<T>(selector: (s: ConsultationStore) => T): T {
  const store = useContext(SessionContext);
  if (!store) throw new Error("useConsultationStore must be used inside <SessionProvider>");
  return useStore(store, selector);
}
