import React, { useMemo } from "react";
import { Navigate, Route, Routes, useNavigate, useSearchParams } from "react-router-dom";
import AuthScreen from "./components/AuthScreen";
import ConsultationApp from "./components/ConsultationApp";
import ToastHost from "./components/ToastHost";
import { LOGIN_PATH, ProtectedRoute, resolveNext } from "./components/ProtectedRoute";
import { resolveConfig } from "./config";
import { useAuth } from "./hooks/useAuth";
import { createCollaborators } from "./services/collaborators";
import type { SessionDependencies } from "./state/consultationStore";

type AppProps = {
  deps?: SessionDependencies;
};

const App: React.FC<AppProps> = ({ deps }) => {
  const sessionDeps = useMemo(() => deps ?? createCollaborators(resolveConfig(import.meta.env)), [deps]);

  return (
    <>
      <Routes>
        <Route path={LOGIN_PATH} element={<LoginPage />} />
        <Route
          path="/"
          element={
            <ProtectedRoute>
              <ConsultationApp deps={sessionDeps} />
            </ProtectedRoute>
          }
        />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
      <ToastHost />
    </>
  );
};

const LoginPage: React.FC = () => {
  const { user } = useAuth();
  const navigate = useNavigate();
  const [params] = useSearchParams();
  const next = resolveNext(params.get("next"));

  if (user) return <Navigate to={next} replace />;
  return <AuthScreen onAuth={() => navigate(next, { replace: true })} />;
};

export default App;
